/**
 * Error types for octoterm.
 *
 * Error hierarchy:
 * - OctotermError (base)
 *   - CredentialError (credential acquisition)
 *     - InputAbortedError
 *     - MissingCredentialError
 *   - ApiError (GitHub REST calls)
 *     - UnauthorizedError
 *     - RateLimitedError
 *     - NetworkError
 *     - RemoteError
 *   - ConfigError (configuration issues)
 *     - ConfigValidationError
 *   - InvalidInputError (operator answers and command arguments)
 */

/**
 * Error severity levels.
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Whether an error is retryable.
 */
export type RetryableStatus = 'retryable' | 'terminal' | 'unknown';

/**
 * Error context for debugging and recovery.
 */
export interface ErrorContext {
  /** Operation that failed */
  operation?: string;
  /** Component where error occurred */
  component?: string;
  /** HTTP method of the failed request */
  method?: string;
  /** API path of the failed request (never includes credentials) */
  path?: string;
  /** Request ID returned by GitHub for tracing */
  requestId?: string;
  /** Timing information */
  timing?: {
    startedAt: Date;
    failedAt: Date;
    durationMs: number;
  };
  /** Retry information */
  retry?: {
    attempt: number;
    maxAttempts: number;
    nextDelayMs?: number;
  };
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

interface OctotermErrorOptions {
  code: string;
  severity?: ErrorSeverity;
  retryable?: RetryableStatus;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all octoterm errors.
 */
export class OctotermError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Error severity */
  readonly severity: ErrorSeverity;
  /** Whether this error is retryable */
  readonly retryable: RetryableStatus;
  /** Error context for debugging */
  readonly context: ErrorContext;
  /** Original error if this wraps another */
  readonly cause?: Error;

  constructor(message: string, options: OctotermErrorOptions) {
    super(message);
    this.name = 'OctotermError';
    this.code = options.code;
    this.severity = options.severity ?? 'medium';
    this.retryable = options.retryable ?? 'unknown';
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a new error with additional context.
   */
  withContext(additionalContext: Partial<ErrorContext>): OctotermError {
    return new OctotermError(this.message, {
      code: this.code,
      severity: this.severity,
      retryable: this.retryable,
      context: { ...this.context, ...additionalContext },
      cause: this.cause,
    });
  }

  /**
   * Convert to JSON for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      retryable: this.retryable,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }
}

// =============================================================================
// Credential Errors
// =============================================================================

/**
 * Base class for credential acquisition errors.
 */
export class CredentialError extends OctotermError {
  constructor(message: string, options: OctotermErrorOptions) {
    super(message, options);
    this.name = 'CredentialError';
  }
}

/**
 * The operator cancelled an interactive prompt.
 */
export class InputAbortedError extends CredentialError {
  constructor(message = 'Input aborted by operator', context?: ErrorContext) {
    super(message, {
      code: 'INPUT_ABORTED',
      severity: 'low',
      retryable: 'terminal',
      context,
    });
    this.name = 'InputAbortedError';
  }
}

/**
 * Username or token is empty, unset, or already released.
 */
export class MissingCredentialError extends CredentialError {
  /** Which half of the credential is missing */
  readonly field: 'identity' | 'secret' | 'credential';

  constructor(
    field: 'identity' | 'secret' | 'credential',
    message?: string,
    context?: ErrorContext
  ) {
    super(message ?? defaultMissingMessage(field), {
      code: 'MISSING_CREDENTIAL',
      severity: 'high',
      retryable: 'terminal',
      context: { ...context, metadata: { ...context?.metadata, field } },
    });
    this.name = 'MissingCredentialError';
    this.field = field;
  }
}

function defaultMissingMessage(field: 'identity' | 'secret' | 'credential'): string {
  switch (field) {
    case 'identity':
      return 'GitHub username is required';
    case 'secret':
      return 'GitHub personal access token is required';
    case 'credential':
      return 'No credential is held';
  }
}

// =============================================================================
// API Errors
// =============================================================================

/**
 * Base class for GitHub API call errors.
 */
export class ApiError extends OctotermError {
  constructor(message: string, options: OctotermErrorOptions) {
    super(message, options);
    this.name = 'ApiError';
  }
}

/**
 * The token was rejected (invalid, expired or revoked).
 */
export class UnauthorizedError extends ApiError {
  /** True when the session refused the call without contacting GitHub */
  readonly failedFast: boolean;

  constructor(message: string, failedFast = false, context?: ErrorContext) {
    super(message, {
      code: 'UNAUTHORIZED',
      severity: 'critical',
      retryable: 'terminal',
      context: { ...context, metadata: { ...context?.metadata, failedFast } },
    });
    this.name = 'UnauthorizedError';
    this.failedFast = failedFast;
  }
}

/**
 * GitHub throttled the request.
 */
export class RateLimitedError extends ApiError {
  /** Retry after in milliseconds if known */
  readonly retryAfterMs?: number;
  /** HTTP status (403 or 429) */
  readonly status: number;

  constructor(status: number, retryAfterMs?: number, message?: string, context?: ErrorContext) {
    super(message ?? formatRateLimitMessage(retryAfterMs), {
      code: 'RATE_LIMITED',
      severity: 'medium',
      retryable: 'retryable',
      context: { ...context, metadata: { ...context?.metadata, status, retryAfterMs } },
    });
    this.name = 'RateLimitedError';
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

function formatRateLimitMessage(retryAfterMs?: number): string {
  if (retryAfterMs === undefined) {
    return 'GitHub rate limit exceeded';
  }
  return `GitHub rate limit exceeded, retry after ${Math.ceil(retryAfterMs / 1000)}s`;
}

/**
 * Transport failure: DNS, connection reset, TLS, or timeout.
 */
export class NetworkError extends ApiError {
  /** Set when the failure was the request timeout firing */
  readonly timeoutMs?: number;

  constructor(message: string, timeoutMs?: number, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: timeoutMs !== undefined ? 'NETWORK_TIMEOUT' : 'NETWORK_ERROR',
      severity: 'high',
      retryable: 'retryable',
      context: { ...context, metadata: { ...context?.metadata, timeoutMs } },
      cause,
    });
    this.name = 'NetworkError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Field-level validation detail GitHub returns with 422 responses.
 */
export interface RemoteErrorDetail {
  resource?: string;
  field?: string;
  code?: string;
  message?: string;
}

/**
 * GitHub answered with a non-2xx status other than 401 or throttling.
 */
export class RemoteError extends ApiError {
  /** HTTP status */
  readonly status: number;
  /** Message from the response body */
  readonly remoteMessage?: string;
  /** Link GitHub attaches to most error bodies */
  readonly documentationUrl?: string;
  /** Validation details (422) */
  readonly details: RemoteErrorDetail[];

  constructor(
    status: number,
    body: { message?: string; documentationUrl?: string; details?: RemoteErrorDetail[] },
    context?: ErrorContext
  ) {
    super(formatRemoteMessage(status, body.message, body.details ?? []), {
      code: 'REMOTE_ERROR',
      severity: status >= 500 ? 'high' : 'medium',
      retryable: 'terminal',
      context: { ...context, metadata: { ...context?.metadata, status } },
    });
    this.name = 'RemoteError';
    this.status = status;
    this.remoteMessage = body.message;
    this.documentationUrl = body.documentationUrl;
    this.details = body.details ?? [];
  }
}

function formatRemoteMessage(
  status: number,
  message: string | undefined,
  details: RemoteErrorDetail[]
): string {
  const base = message ? `GitHub API error ${status}: ${message}` : `GitHub API error ${status}`;
  const described = details
    .map((d) => d.message ?? [d.resource, d.field, d.code].filter(Boolean).join(' '))
    .filter((text) => text.length > 0);
  return described.length > 0 ? `${base} (${described.join('; ')})` : base;
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Configuration-related error.
 */
export class ConfigError extends OctotermError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: 'CONFIG_ERROR',
      severity: 'high',
      retryable: 'terminal',
      context,
      cause,
    });
    this.name = 'ConfigError';
  }
}

/**
 * Configuration validation failed.
 */
export class ConfigValidationError extends ConfigError {
  /** Validation errors */
  readonly validationErrors: string[];

  constructor(path: string, errors: string[], context?: ErrorContext) {
    super(`Invalid configuration in ${path}:\n${errors.map((e) => `  - ${e}`).join('\n')}`, {
      ...context,
      metadata: { ...context?.metadata, path, validationErrors: errors },
    });
    this.name = 'ConfigValidationError';
    this.validationErrors = errors;
  }
}

/**
 * An operator answer or command argument was rejected.
 */
export class InvalidInputError extends OctotermError {
  constructor(message: string, context?: ErrorContext) {
    super(message, {
      code: 'INVALID_INPUT',
      severity: 'low',
      retryable: 'terminal',
      context,
    });
    this.name = 'InvalidInputError';
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Check if an error is an OctotermError.
 */
export function isOctotermError(error: unknown): error is OctotermError {
  return error instanceof OctotermError;
}

/**
 * Check if an error is retryable.
 */
export function isRetryable(error: unknown): boolean {
  if (isOctotermError(error)) {
    return error.retryable === 'retryable';
  }
  // For unknown errors, default to retryable for transient issues
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('fetch failed')
    );
  }
  return false;
}

/**
 * Wrap an unknown error in an OctotermError.
 *
 * Typed errors keep their class; context is only merged into plain
 * OctotermErrors so callers can still `instanceof` the taxonomy.
 */
export function wrapError(error: unknown, context?: ErrorContext): OctotermError {
  if (isOctotermError(error)) {
    if (!context || error.constructor !== OctotermError) {
      return error;
    }
    return error.withContext(context);
  }

  const originalError = error instanceof Error ? error : new Error(String(error));

  return new OctotermError(originalError.message, {
    code: 'UNKNOWN_ERROR',
    severity: 'medium',
    retryable: 'unknown',
    context,
    cause: originalError,
  });
}

/**
 * Extract error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Create timing context for error tracking.
 */
export function createTimingContext(startedAt: Date): ErrorContext['timing'] {
  const failedAt = new Date();
  return {
    startedAt,
    failedAt,
    durationMs: failedAt.getTime() - startedAt.getTime(),
  };
}
