/**
 * octoterm - GitHub account operations from the terminal
 *
 * @packageDocumentation
 */

// Credentials
export {
  acquireCredential,
  acquireInteractive,
  acquireStatic,
  resolveStaticCredential,
  describeCredentialSource,
  CredentialGuard,
  withCredential,
  createTerminalPrompter,
} from './auth/index.js';
export type {
  Credential,
  CredentialSource,
  ResolvedCredential,
  StaticCredentialOptions,
  AcquireCredentialOptions,
  ExitHookTarget,
  Prompter,
  TerminalPrompterOptions,
} from './auth/index.js';

// Session
export { ApiSession, openSession, isIdempotentMethod } from './session/index.js';
export { isRateLimitResponse, parseRetryAfter } from './session/index.js';
export type {
  ApiResponse,
  HttpMethod,
  QueryParams,
  SendOptions,
  SessionOptions,
  SessionState,
} from './session/index.js';

// GitHub
export { GitHubClient } from './github/index.js';
export type {
  GitHubClientOptions,
  MutationOptions,
  CreatedRepository,
  GitHubUser,
  Repository,
  CreateRepositoryInput,
  ContentFile,
  ContentUpdate,
  PutFileInput,
  DownloadedFile,
  Workflow,
  WorkflowList,
  Gist,
  CreateGistInput,
  Notification,
  Issue,
  IssueState,
  CreateIssueInput,
} from './github/index.js';

// Configuration
export {
  loadConfig,
  loadConfigFile,
  findConfigFile,
  getDefaultConfig,
  generateDefaultConfig,
  configSchema,
} from './config/loader.js';
export type { OctotermConfig, ConfigSearchOptions } from './config/loader.js';

// Errors
export {
  OctotermError,
  CredentialError,
  InputAbortedError,
  MissingCredentialError,
  ApiError,
  UnauthorizedError,
  RateLimitedError,
  NetworkError,
  RemoteError,
  ConfigError,
  ConfigValidationError,
  InvalidInputError,
  isOctotermError,
  isRetryable,
  wrapError,
  getErrorMessage,
} from './errors/types.js';
export type { ErrorContext, ErrorSeverity, RetryableStatus, RemoteErrorDetail } from './errors/types.js';
export { withRetry, calculateDelay, READ_RETRY_OPTIONS } from './errors/retry.js';
export type { RetryOptions } from './errors/retry.js';

// Logging
export {
  createLogger,
  getLogger,
  configureLogger,
  resetLogger,
  type Logger,
  type LoggerConfig,
  type LogLevel,
} from './logging/logger.js';

export { VERSION, USER_AGENT } from './version.js';
