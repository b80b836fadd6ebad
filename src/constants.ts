/**
 * Centralized constants for the octoterm CLI.
 *
 * This file consolidates magic numbers and configuration values
 * to improve maintainability and provide a single source of truth.
 */

// ==================== Timeouts ====================

/**
 * Default timeout values in milliseconds.
 */
export const TIMEOUTS = {
  /** Default request timeout (30 seconds) */
  DEFAULT: 30000,
  /** Minimum accepted request timeout (1 second) */
  MIN_REQUEST: 1000,
  /** Maximum accepted request timeout (5 minutes) */
  MAX_REQUEST: 300000,
  /** Wait before rewriting the README of a freshly initialized repository */
  README_INIT_DELAY: 2000,
} as const;

// ==================== GitHub API ====================

/**
 * GitHub REST API settings.
 */
export const GITHUB = {
  /** Public GitHub REST endpoint */
  API_BASE_URL: 'https://api.github.com',
  /** Media type requested on every call */
  ACCEPT: 'application/vnd.github.v3+json',
  /** Authorization scheme for personal access tokens */
  AUTH_SCHEME: 'token',
  /** Environment variable holding the account handle */
  USERNAME_ENV_VAR: 'GITHUB_USERNAME',
  /** Default environment variable holding the access token */
  TOKEN_ENV_VAR: 'GITHUB_TOKEN',
  /** Page size for list calls */
  PER_PAGE: 100,
  /** Default branch for content and workflow operations */
  DEFAULT_BRANCH: 'main',
  /** Where personal access tokens are created */
  TOKEN_SETTINGS_URL: 'https://github.com/settings/tokens',
} as const;

/**
 * Response headers GitHub uses to describe rate limiting.
 */
export const RATE_LIMIT_HEADERS = {
  RETRY_AFTER: 'retry-after',
  REMAINING: 'x-ratelimit-remaining',
  RESET: 'x-ratelimit-reset',
} as const;

// ==================== Retry ====================

/**
 * Retry policy for idempotent requests.
 */
export const RETRY = {
  /** Retries after the first attempt for read requests */
  MAX_RETRIES: 1,
  /** Upper bound accepted from configuration */
  MAX_RETRIES_LIMIT: 5,
  /** Initial backoff delay */
  INITIAL_DELAY_MS: 500,
  /** Backoff ceiling */
  MAX_DELAY_MS: 10000,
} as const;

/**
 * HTTP methods that are safe to repeat.
 */
export const IDEMPOTENT_METHODS = ['GET', 'HEAD', 'OPTIONS'] as const;

// ==================== Security ====================

/**
 * Security settings for the CLI.
 */
export const CLI_SECURITY = {
  /** Hosts allowed to use plain HTTP */
  LOCALHOST_HOSTS: ['localhost', '127.0.0.1', '::1', '[::1]'],
  /** Replacement for secrets in any text leaving the process */
  REDACTED: '[REDACTED]',
  /** Log record paths censored by the logger */
  REDACT_PATHS: [
    'authorization',
    'headers.authorization',
    'headers.Authorization',
    'token',
    'secret',
    'credential.secret',
    '*.authorization',
    '*.token',
    '*.secret',
  ],
} as const;

// ==================== Paths ====================

/**
 * File and directory names used by the CLI.
 */
export const PATHS = {
  /** Per-user settings directory under $HOME */
  CONFIG_DIR: '.octoterm',
  /** Config file names searched in order */
  CONFIG_FILENAMES: ['octoterm.yaml', 'octoterm.yml', '.octoterm.yaml', '.octoterm.yml'],
  /** Default name for `octoterm init` */
  DEFAULT_CONFIG_FILENAME: 'octoterm.yaml',
  /** dotenv file read for static credentials */
  ENV_FILENAME: '.env',
} as const;

// ==================== Exit Codes ====================

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  /** Normal completion */
  SUCCESS: 0,
  /** Remote, configuration or I/O failure */
  ERROR: 1,
  /** Username or token missing */
  MISSING_CREDENTIAL: 2,
  /** Token rejected by GitHub */
  UNAUTHORIZED: 3,
  /** GitHub throttled the account */
  RATE_LIMITED: 4,
  /** Transport failure or timeout */
  NETWORK: 5,
  /** Operator cancelled input (128 + SIGINT) */
  ABORTED: 130,
} as const;

/**
 * Signal numbers used to compute exit codes for signal-triggered exits.
 */
export const SIGNAL_NUMBERS = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGTERM: 15,
} as const;
