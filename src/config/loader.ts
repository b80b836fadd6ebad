import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { GITHUB, PATHS, RETRY, TIMEOUTS } from '../constants.js';
import { ConfigError, ConfigValidationError, getErrorMessage } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import { isLocalhost } from '../utils/network.js';
import { parseYamlSecure } from '../utils/yaml-parser.js';

/**
 * Base URL must be HTTPS, or HTTP on localhost (tests, local proxies).
 */
function isSecureBaseUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' || (url.protocol === 'http:' && isLocalhost(url.hostname));
  } catch {
    return false;
  }
}

/**
 * Zod schema for the GitHub section.
 *
 * Note: a `token` key is rejected before validation. Tokens come from the
 * environment, a .env file or the prompt, never from this file.
 */
const githubConfigSchema = z
  .object({
    baseUrl: z
      .string()
      .url()
      .refine(isSecureBaseUrl, 'must use https (http is only allowed for localhost)')
      .default(GITHUB.API_BASE_URL),
    username: z.string().min(1).optional(),
    tokenEnvVar: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an environment variable name')
      .default(GITHUB.TOKEN_ENV_VAR),
  })
  .default({});

const requestConfigSchema = z
  .object({
    timeout: z
      .number()
      .int()
      .min(TIMEOUTS.MIN_REQUEST)
      .max(TIMEOUTS.MAX_REQUEST)
      .default(TIMEOUTS.DEFAULT),
    maxRetries: z.number().int().min(0).max(RETRY.MAX_RETRIES_LIMIT).default(RETRY.MAX_RETRIES),
    retryDelayMs: z.number().int().min(0).max(RETRY.MAX_DELAY_MS).default(RETRY.INITIAL_DELAY_MS),
  })
  .default({});

const loggingConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
    file: z.string().min(1).optional(),
    pretty: z.boolean().default(false),
  })
  .default({});

/**
 * Complete schema for octoterm configuration.
 * Any positive version is accepted for forward compatibility; only 1 exists.
 */
export const configSchema = z.object({
  version: z.number().int().min(1).default(1),
  github: githubConfigSchema,
  request: requestConfigSchema,
  logging: loggingConfigSchema,
});

/**
 * octoterm configuration file structure.
 */
export type OctotermConfig = z.infer<typeof configSchema>;

/**
 * Where to look for a config file when none is named.
 */
export interface ConfigSearchOptions {
  /** Project directory (default cwd) */
  cwd?: string;
  /** Home directory holding ~/.octoterm (default os.homedir()) */
  homeDir?: string;
}

/**
 * Default configuration.
 */
export function getDefaultConfig(): OctotermConfig {
  return configSchema.parse({});
}

/**
 * Locate the first config file in the project directory, then ~/.octoterm.
 */
export function findConfigFile(options: ConfigSearchOptions = {}): string | undefined {
  const searchDirs = [
    options.cwd ?? process.cwd(),
    join(options.homeDir ?? homedir(), PATHS.CONFIG_DIR),
  ];

  for (const dir of searchDirs) {
    for (const name of PATHS.CONFIG_FILENAMES) {
      const configPath = join(dir, name);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
  }
  return undefined;
}

/**
 * Load configuration from file or return defaults.
 *
 * @throws ConfigError when a named file is missing, unreadable, or holds a token
 * @throws ConfigValidationError when the file does not match the schema
 */
export function loadConfig(explicitPath?: string, options: ConfigSearchOptions = {}): OctotermConfig {
  if (explicitPath) {
    return loadConfigFile(explicitPath);
  }

  const found = findConfigFile(options);
  if (!found) {
    getLogger('config').debug('No config file found, using defaults');
    return getDefaultConfig();
  }
  return loadConfigFile(found);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and parse a specific config file.
 */
export function loadConfigFile(path: string): OctotermConfig {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`, { metadata: { path } });
  }

  let parsed: unknown;
  try {
    parsed = parseYamlSecure(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Invalid YAML in config file ${path}: ${getErrorMessage(error)}`,
      { metadata: { path } },
      error instanceof Error ? error : undefined
    );
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return getDefaultConfig();
  }

  if (isRecord(parsed) && isRecord(parsed.github) && parsed.github.token !== undefined) {
    throw new ConfigError(
      `Security Error: GitHub token found in config file "${path}".\n` +
        `Tokens must not be stored in config files.\n` +
        `Remove 'github.token' and export the token as an environment variable instead:\n\n` +
        `  github:\n` +
        `    tokenEnvVar: ${GITHUB.TOKEN_ENV_VAR}  # References $${GITHUB.TOKEN_ENV_VAR}`,
      { metadata: { path } }
    );
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const issuePath = issue.path.join('.');
      return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
    });
    throw new ConfigValidationError(path, issues);
  }

  getLogger('config').debug({ path }, 'Loaded config file');
  return result.data;
}

/**
 * Generate default config file content.
 */
export function generateDefaultConfig(): string {
  return `# octoterm configuration
version: 1

github:
  baseUrl: ${GITHUB.API_BASE_URL}  # GitHub Enterprise: https://HOST/api/v3
  # username: your-login
  # The token is read from this environment variable (or a .env file).
  # Never put the token itself in this file.
  tokenEnvVar: ${GITHUB.TOKEN_ENV_VAR}

request:
  timeout: ${TIMEOUTS.DEFAULT}      # per-request timeout (ms)
  maxRetries: ${RETRY.MAX_RETRIES}         # retries for read requests on network failure
  retryDelayMs: ${RETRY.INITIAL_DELAY_MS}

logging:
  level: warn           # debug | info | warn | error | silent
  # file: ./octoterm.log
  pretty: false         # human-readable log lines
`;
}
