/**
 * Authenticated API session.
 *
 * Every request carries the guarded credential in the Authorization header
 * and travels over HTTPS. Responses are mapped onto the error taxonomy:
 * 401 -> UnauthorizedError, throttling -> RateLimitedError, transport
 * failures and timeouts -> NetworkError, any other non-2xx -> RemoteError.
 */

import { CredentialGuard } from '../auth/guard.js';
import type { Credential } from '../auth/credentials.js';
import { GITHUB, RETRY, TIMEOUTS, IDEMPOTENT_METHODS } from '../constants.js';
import {
  NetworkError,
  RateLimitedError,
  RemoteError,
  UnauthorizedError,
  getErrorMessage,
  type ErrorContext,
  type RemoteErrorDetail,
} from '../errors/types.js';
import { READ_RETRY_OPTIONS, withRetry } from '../errors/retry.js';
import { getLogger, startTiming, type Logger } from '../logging/logger.js';
import { assertSecureUrl, buildUrl } from '../utils/network.js';
import { redactHeaders, truncate } from '../utils/sanitize.js';
import { createTimeoutAbortController, isTimeoutAbort } from '../utils/timeout.js';
import { USER_AGENT } from '../version.js';
import { isRateLimitResponse, parseRetryAfter } from './rate-limit.js';
import type {
  ApiResponse,
  HttpMethod,
  SendOptions,
  SessionOptions,
  SessionState,
} from './types.js';

/** Longest remote error text kept in messages */
const MAX_REMOTE_TEXT = 200;

interface ErrorBody {
  message?: string;
  documentationUrl?: string;
  details: RemoteErrorDetail[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toDetail(entry: unknown): RemoteErrorDetail {
  if (typeof entry === 'string') {
    return { message: entry };
  }
  if (!isRecord(entry)) {
    return {};
  }
  return {
    resource: optionalString(entry.resource),
    field: optionalString(entry.field),
    code: optionalString(entry.code),
    message: optionalString(entry.message),
  };
}

/**
 * Pull GitHub's `{ message, documentation_url, errors }` out of a body.
 */
function readErrorBody(data: unknown): ErrorBody {
  if (typeof data === 'string') {
    const text = data.trim();
    return { message: text ? truncate(text, MAX_REMOTE_TEXT) : undefined, details: [] };
  }
  if (!isRecord(data)) {
    return { details: [] };
  }
  return {
    message: optionalString(data.message),
    documentationUrl: optionalString(data.documentation_url),
    details: Array.isArray(data.errors) ? data.errors.map(toDetail) : [],
  };
}

/**
 * Read a response body: JSON when declared, text otherwise, undefined when empty.
 */
async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return undefined;
  }
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('json')) {
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
  return text;
}

/**
 * Whether a method is safe to repeat automatically.
 */
export function isIdempotentMethod(method: HttpMethod): boolean {
  return IDEMPOTENT_METHODS.some((idempotent) => idempotent === method);
}

/**
 * Authenticated session against the GitHub REST API.
 */
export class ApiSession {
  private readonly guard: CredentialGuard;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private currentState: SessionState = 'unauthenticated';

  constructor(guard: CredentialGuard, options: SessionOptions = {}) {
    const baseUrl = options.baseUrl ?? GITHUB.API_BASE_URL;
    assertSecureUrl(baseUrl);

    this.guard = guard;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.DEFAULT;
    this.maxRetries = Math.max(0, options.maxRetries ?? RETRY.MAX_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? RETRY.INITIAL_DELAY_MS;
    this.logger = options.logger ?? getLogger('session');
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Account handle of the held credential.
   */
  get identity(): string {
    return this.guard.identity;
  }

  /**
   * Issue an authenticated request.
   *
   * Idempotent methods are retried on NetworkError with bounded backoff;
   * mutating methods are attempted once unless `options.allowRetry` is set.
   */
  async send<T = unknown>(
    method: HttpMethod,
    path: string,
    body?: unknown,
    options: SendOptions = {}
  ): Promise<ApiResponse<T>> {
    const allowRetry = options.allowRetry ?? isIdempotentMethod(method);
    const attempt = (): Promise<ApiResponse<T>> => this.execute<T>(method, path, body, options);

    if (!allowRetry || this.maxRetries === 0) {
      return attempt();
    }

    return withRetry(attempt, {
      ...READ_RETRY_OPTIONS,
      maxAttempts: this.maxRetries + 1,
      initialDelayMs: this.retryDelayMs,
      operation: `${method} ${path}`,
    });
  }

  /**
   * Swap in a new credential after the old one was rejected.
   */
  refresh(credential: Credential): void {
    this.guard.hold(credential);
    this.currentState = 'unauthenticated';
    this.logger.info({ identity: credential.identity }, 'Session credential refreshed');
  }

  /**
   * Release the credential. The session cannot send afterwards.
   */
  close(): void {
    this.guard.release();
  }

  private async execute<T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    options: SendOptions
  ): Promise<ApiResponse<T>> {
    const context: ErrorContext = { component: 'session', method, path };

    if (this.currentState === 'invalid') {
      throw new UnauthorizedError(
        'GitHub rejected this token earlier in the session; supply a new token to continue',
        true,
        context
      );
    }

    const url = buildUrl(this.baseUrl, path, options.query);
    const headers: Record<string, string> = {
      Accept: GITHUB.ACCEPT,
      'User-Agent': USER_AGENT,
      ...options.headers,
      Authorization: this.guard.authorizationHeader(),
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    this.logger.debug({ method, url, headers: redactHeaders(headers) }, 'GitHub request');
    const elapsed = startTiming();

    const { controller, cleanup } = createTimeoutAbortController(this.timeoutMs, `${method} ${path}`);
    let response: Response;
    let data: unknown;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
      data = await readBody(response);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      if (isTimeoutAbort(controller.signal)) {
        throw new NetworkError(
          `Request timed out after ${this.timeoutMs}ms`,
          this.timeoutMs,
          context,
          cause
        );
      }
      throw new NetworkError(
        `Network request failed: ${this.guard.redact(getErrorMessage(error))}`,
        undefined,
        context,
        cause
      );
    } finally {
      cleanup();
    }

    const durationMs = elapsed();
    const requestId = response.headers.get('x-github-request-id') ?? undefined;
    this.logger.debug(
      { method, path, status: response.status, durationMs, requestId },
      'GitHub response'
    );
    const responseContext: ErrorContext = { ...context, requestId };

    if (response.status === 401) {
      this.currentState = 'invalid';
      const { message } = readErrorBody(data);
      this.logger.warn({ method, path }, 'Token rejected, session invalidated');
      throw new UnauthorizedError(
        `GitHub rejected the credentials: ${this.guard.redact(message ?? 'Bad credentials')}`,
        false,
        responseContext
      );
    }

    if (this.currentState === 'unauthenticated') {
      this.currentState = 'authenticated';
      this.logger.info({ identity: this.guard.identity }, 'Session authenticated');
    }

    if (!response.ok) {
      const errorBody = readErrorBody(data);
      const message = errorBody.message ? this.guard.redact(errorBody.message) : undefined;

      if (isRateLimitResponse(response.status, response.headers, message)) {
        const retryAfterMs = parseRetryAfter(response.headers);
        throw new RateLimitedError(response.status, retryAfterMs, undefined, responseContext);
      }

      throw new RemoteError(
        response.status,
        {
          message,
          documentationUrl: errorBody.documentationUrl,
          details: errorBody.details.map((detail) => ({
            ...detail,
            message: detail.message ? this.guard.redact(detail.message) : undefined,
          })),
        },
        responseContext
      );
    }

    return {
      status: response.status,
      headers: response.headers,
      data: data as T,
    };
  }
}

/**
 * Hold a credential in a fresh guard and open a session on it.
 */
export function openSession(credential: Credential, options: SessionOptions = {}): ApiSession {
  const guard = new CredentialGuard();
  guard.hold(credential);
  try {
    return new ApiSession(guard, options);
  } catch (error) {
    guard.release();
    throw error;
  }
}
