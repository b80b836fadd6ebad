import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { ExitHookTarget } from '../../../src/auth/guard.js';
import { openCommandContext, parseGlobalOptions } from '../../../src/cli/commands/shared.js';
import { configureOutput, resetOutput } from '../../../src/cli/output.js';
import {
  ConfigValidationError,
  MissingCredentialError,
  UnauthorizedError,
} from '../../../src/errors/types.js';
import { configureLogger, resetLogger } from '../../../src/logging/logger.js';
import { jsonResponse, requestAt, stubFetch, type FetchMock } from '../../fixtures/http.js';
import { ScriptedPrompter } from '../../fixtures/prompter.js';

class FakeProcess extends EventEmitter implements ExitHookTarget {
  exit(): void {}
}

describe('cli/commands/shared', () => {
  describe('parseGlobalOptions', () => {
    it('should apply defaults', () => {
      expect(parseGlobalOptions({})).toEqual({ input: true, color: true, quiet: false });
    });

    it('should coerce the timeout', () => {
      expect(parseGlobalOptions({ timeout: '5000' }).timeout).toBe(5000);
    });

    it('should reject out-of-range timeouts', () => {
      expect(() => parseGlobalOptions({ timeout: '5' })).toThrow(ConfigValidationError);
      expect(() => parseGlobalOptions({ timeout: '5' })).toThrow(
        '--timeout: Number must be greater than or equal to 1000'
      );
    });

    it('should reject unknown log levels', () => {
      expect(() => parseGlobalOptions({ logLevel: 'loud' })).toThrow(ConfigValidationError);
    });
  });

  describe('openCommandContext', () => {
    let fetchMock: FetchMock;
    let testDir: string;
    let projectDir: string;
    let homeDir: string;
    let target: FakeProcess;

    beforeEach(() => {
      configureLogger({ level: 'silent' });
      configureOutput({ noColor: true });
      vi.spyOn(console, 'log').mockImplementation(() => {});
      fetchMock = stubFetch();
      target = new FakeProcess();
      testDir = join(tmpdir(), `octoterm-context-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      projectDir = join(testDir, 'project');
      homeDir = join(testDir, 'home');
      mkdirSync(projectDir, { recursive: true });
      mkdirSync(homeDir, { recursive: true });
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
      vi.unstubAllGlobals();
      resetOutput();
      resetLogger();
      vi.restoreAllMocks();
    });

    const quiet = () => parseGlobalOptions({ logLevel: 'silent' });

    it('should verify a configured credential', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ login: 'alice' }));

      const ctx = await openCommandContext(quiet(), {
        env: { GITHUB_USERNAME: 'alice', GITHUB_TOKEN: 'ghp_example' },
        cwd: projectDir,
        homeDir,
        exitTarget: target,
      });

      expect(ctx.user.login).toBe('alice');
      expect(ctx.session.state).toBe('authenticated');
      expect(ctx.client.owner).toBe('alice');
      expect(requestAt(fetchMock, 0).headers.get('authorization')).toBe('token ghp_example');
      expect(console.log).toHaveBeenCalledWith('✓ Authenticated as alice');
      expect(target.listenerCount('SIGINT')).toBe(1);

      ctx.close();

      expect(target.listenerCount('SIGINT')).toBe(0);
      await expect(ctx.session.send('GET', '/user')).rejects.toThrow(MissingCredentialError);
    });

    it('should use the base URL from the project config', async () => {
      writeFileSync(join(projectDir, 'octoterm.yaml'), 'github:\n  baseUrl: http://localhost:9999\n');
      fetchMock.mockResolvedValueOnce(jsonResponse({ login: 'alice' }));

      const ctx = await openCommandContext(quiet(), {
        env: { GITHUB_USERNAME: 'alice', GITHUB_TOKEN: 'ghp_example' },
        cwd: projectDir,
        homeDir,
        exitTarget: target,
      });
      ctx.close();

      expect(requestAt(fetchMock, 0).url).toBe('http://localhost:9999/user');
    });

    it('should share the credential prompter with the command', async () => {
      const prompter = new ScriptedPrompter(['alice', 'ghp_example']);
      fetchMock.mockResolvedValueOnce(jsonResponse({ login: 'alice' }));

      const ctx = await openCommandContext(quiet(), {
        env: {},
        cwd: projectDir,
        homeDir,
        exitTarget: target,
        createPrompter: () => prompter,
      });

      expect(ctx.prompter()).toBe(prompter);
      expect(prompter.closed).toBe(false);

      ctx.close();

      expect(prompter.closed).toBe(true);
    });

    it('should release everything when verification fails', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'Bad credentials' }, { status: 401 }));

      await expect(
        openCommandContext(quiet(), {
          env: { GITHUB_USERNAME: 'alice', GITHUB_TOKEN: 'ghp_example' },
          cwd: projectDir,
          homeDir,
          exitTarget: target,
        })
      ).rejects.toThrow(UnauthorizedError);

      expect(target.listenerCount('exit')).toBe(0);
      expect(target.listenerCount('SIGTERM')).toBe(0);
    });

    it('should fail without prompting when input is disabled', async () => {
      const createPrompter = vi.fn(() => new ScriptedPrompter([]));

      await expect(
        openCommandContext(parseGlobalOptions({ logLevel: 'silent', input: false }), {
          env: {},
          cwd: projectDir,
          homeDir,
          exitTarget: target,
          createPrompter,
        })
      ).rejects.toThrow(MissingCredentialError);

      expect(createPrompter).not.toHaveBeenCalled();
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
