import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  configSchema,
  findConfigFile,
  generateDefaultConfig,
  getDefaultConfig,
  loadConfig,
  loadConfigFile,
} from '../../src/config/loader.js';
import { ConfigError, ConfigValidationError } from '../../src/errors/types.js';
import { parseYamlSecure } from '../../src/utils/yaml-parser.js';

describe('config/loader', () => {
  let testDir: string;
  let projectDir: string;
  let homeDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `octoterm-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    projectDir = join(testDir, 'project');
    homeDir = join(testDir, 'home');
    mkdirSync(projectDir, { recursive: true });
    mkdirSync(join(homeDir, '.octoterm'), { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  function writeConfig(dir: string, name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  describe('getDefaultConfig', () => {
    it('should fill every section', () => {
      expect(getDefaultConfig()).toEqual({
        version: 1,
        github: { baseUrl: 'https://api.github.com', tokenEnvVar: 'GITHUB_TOKEN' },
        request: { timeout: 30000, maxRetries: 1, retryDelayMs: 500 },
        logging: { level: 'warn', pretty: false },
      });
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when no file exists', () => {
      expect(loadConfig(undefined, { cwd: projectDir, homeDir })).toEqual(getDefaultConfig());
    });

    it('should merge a partial file over the defaults', () => {
      writeConfig(projectDir, 'octoterm.yaml', 'github:\n  username: alice\nrequest:\n  timeout: 5000\n');

      const config = loadConfig(undefined, { cwd: projectDir, homeDir });

      expect(config.github.username).toBe('alice');
      expect(config.github.tokenEnvVar).toBe('GITHUB_TOKEN');
      expect(config.request).toEqual({ timeout: 5000, maxRetries: 1, retryDelayMs: 500 });
    });

    it('should load an explicit path', () => {
      const path = writeConfig(testDir, 'custom.yml', 'logging:\n  level: debug\n');

      expect(loadConfig(path, { cwd: projectDir, homeDir }).logging.level).toBe('debug');
    });

    it('should fail when an explicit path is missing', () => {
      const missing = join(testDir, 'missing.yaml');

      expect(() => loadConfig(missing)).toThrow(`Config file not found: ${missing}`);
    });
  });

  describe('findConfigFile', () => {
    it('should prefer the project directory', () => {
      const project = writeConfig(projectDir, '.octoterm.yml', 'version: 1\n');
      writeConfig(join(homeDir, '.octoterm'), 'octoterm.yaml', 'version: 1\n');

      expect(findConfigFile({ cwd: projectDir, homeDir })).toBe(project);
    });

    it('should fall back to ~/.octoterm', () => {
      const global = writeConfig(join(homeDir, '.octoterm'), 'octoterm.yaml', 'version: 1\n');

      expect(findConfigFile({ cwd: projectDir, homeDir })).toBe(global);
    });

    it('should honour the name order', () => {
      writeConfig(projectDir, 'octoterm.yml', 'version: 1\n');
      const first = writeConfig(projectDir, 'octoterm.yaml', 'version: 1\n');

      expect(findConfigFile({ cwd: projectDir, homeDir })).toBe(first);
    });
  });

  describe('loadConfigFile', () => {
    it('should treat an empty file as defaults', () => {
      const path = writeConfig(testDir, 'empty.yaml', '');

      expect(loadConfigFile(path)).toEqual(getDefaultConfig());
    });

    it('should refuse a token in the file', () => {
      const path = writeConfig(testDir, 'token.yaml', 'github:\n  token: ghp_example\n');

      try {
        loadConfigFile(path);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        expect(error).not.toBeInstanceOf(ConfigValidationError);
        const message = error instanceof Error ? error.message : '';
        expect(message).toMatch(/^Security Error: GitHub token found in config file ".*token\.yaml"\./);
        expect(message).not.toContain('ghp_example');
      }
    });

    it('should report invalid YAML', () => {
      const path = writeConfig(testDir, 'broken.yaml', 'github: [unclosed\n');

      expect(() => loadConfigFile(path)).toThrow(`Invalid YAML in config file ${path}:`);
    });

    it('should list schema violations', () => {
      const path = writeConfig(
        testDir,
        'invalid.yaml',
        'github:\n  baseUrl: http://github.example.com\n  tokenEnvVar: "not a name"\nrequest:\n  timeout: 10\n'
      );

      try {
        loadConfigFile(path);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.validationErrors).toEqual([
            'github.baseUrl: must use https (http is only allowed for localhost)',
            'github.tokenEnvVar: must be an environment variable name',
            'request.timeout: Number must be greater than or equal to 1000',
          ]);
        }
      }
    });

    it('should allow http on localhost', () => {
      const path = writeConfig(testDir, 'local.yaml', 'github:\n  baseUrl: http://localhost:3000\n');

      expect(loadConfigFile(path).github.baseUrl).toBe('http://localhost:3000');
    });

    it('should reject an unknown log level', () => {
      const path = writeConfig(testDir, 'level.yaml', 'logging:\n  level: verbose\n');

      expect(() => loadConfigFile(path)).toThrow(ConfigValidationError);
    });
  });

  describe('generateDefaultConfig', () => {
    it('should produce a file the loader accepts', () => {
      const parsed = configSchema.parse(parseYamlSecure(generateDefaultConfig()));

      expect(parsed).toEqual(getDefaultConfig());
    });

    it('should not contain a token key', () => {
      expect(generateDefaultConfig()).not.toMatch(/^\s*token:/m);
    });
  });
});
