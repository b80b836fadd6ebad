import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, rmSync, existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  createLogger,
  getLogger,
  configureLogger,
  resetLogger,
  childLogger,
  startTiming,
} from '../../src/logging/logger.js';

function collectingStream(lines: string[]) {
  return {
    write(message: string) {
      lines.push(message);
    },
  };
}

describe('logging/logger', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `octoterm-logger-test-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
    resetLogger();
  });

  afterEach(() => {
    resetLogger();
    rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('createLogger', () => {
    it('should apply custom log level', () => {
      expect(createLogger({ level: 'debug' }).level).toBe('debug');
      expect(createLogger({ level: 'silent' }).level).toBe('silent');
    });

    it('should write labelled JSON records to a stream', () => {
      const lines: string[] = [];
      const logger = createLogger({ level: 'info', timestamp: false, stream: collectingStream(lines) });

      logger.info({ repo: 'demo' }, 'Repository created');

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
        level: 'info',
        repo: 'demo',
        msg: 'Repository created',
      });
    });

    it('should drop records below the level', () => {
      const lines: string[] = [];
      const logger = createLogger({ level: 'warn', stream: collectingStream(lines) });

      logger.info('hidden');
      logger.debug('hidden');

      expect(lines).toEqual([]);
    });

    it('should censor credential paths', () => {
      const lines: string[] = [];
      const logger = createLogger({ level: 'debug', timestamp: false, stream: collectingStream(lines) });

      logger.debug(
        {
          token: 'ghp_example',
          headers: { authorization: 'token ghp_example', Authorization: 'token ghp_example', accept: 'json' },
          credential: { identity: 'alice', secret: 'ghp_example' },
        },
        'GitHub request'
      );

      const record = JSON.parse(lines[0] ?? '{}');
      expect(record.token).toBe('[REDACTED]');
      expect(record.headers).toEqual({
        authorization: '[REDACTED]',
        Authorization: '[REDACTED]',
        accept: 'json',
      });
      expect(record.credential).toEqual({ identity: 'alice', secret: '[REDACTED]' });
      expect(lines[0]).not.toContain('ghp_example');
    });

    it('should write records to stderr and leave stdout to command output', () => {
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const logger = createLogger({ level: 'warn', timestamp: false });

      logger.warn('Token belongs to a different account than the supplied username');

      expect(stdout).not.toHaveBeenCalled();
      expect(stderr).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(stderr.mock.calls[0]?.[0]))).toMatchObject({
        level: 'warn',
        msg: 'Token belongs to a different account than the supplied username',
      });
    });

    it('should write to file when file path provided', async () => {
      const logFile = join(testDir, 'test.log');
      const logger = createLogger({ file: logFile, level: 'info' });

      logger.info('test message');

      // pino.destination writes asynchronously
      await new Promise((resolve) => setTimeout(resolve, 100));

      expect(existsSync(logFile)).toBe(true);
      expect(readFileSync(logFile, 'utf-8')).toContain('test message');
    });
  });

  describe('getLogger', () => {
    it('should return same global instance on multiple calls', () => {
      expect(getLogger()).toBe(getLogger());
    });

    it('should tag child loggers with their component', () => {
      const lines: string[] = [];
      configureLogger({ level: 'info', timestamp: false, stream: collectingStream(lines) });

      getLogger('session').info('Session authenticated');

      expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ component: 'session', msg: 'Session authenticated' });
    });
  });

  describe('configureLogger', () => {
    it('should replace previous configuration', () => {
      configureLogger({ level: 'debug' });
      configureLogger({ level: 'error' });

      expect(getLogger().level).toBe('error');
    });

    it('should not affect loggers created before it', () => {
      configureLogger({ level: 'silent' });
      const early = getLogger('early');
      configureLogger({ level: 'debug' });

      expect(early.level).toBe('silent');
      expect(getLogger('late').level).toBe('debug');
    });
  });

  describe('childLogger', () => {
    it('should include context bindings', () => {
      const lines: string[] = [];
      const parent = createLogger({ level: 'info', timestamp: false, stream: collectingStream(lines) });

      childLogger(parent, { requestId: 'ABC' }).info('done');

      expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ requestId: 'ABC', msg: 'done' });
    });
  });

  describe('startTiming', () => {
    it('should report elapsed milliseconds', () => {
      vi.spyOn(performance, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1012.4);

      const elapsed = startTiming();

      expect(elapsed()).toBe(12);
    });
  });
});
