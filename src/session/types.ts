/**
 * API session types.
 */

import type { Logger } from '../logging/logger.js';

/**
 * HTTP methods the GitHub REST API uses.
 */
export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Session lifecycle.
 *
 * - unauthenticated: no response received yet
 * - authenticated: GitHub answered at least once with something other than 401
 * - invalid: GitHub rejected the token; calls fail fast until refresh()
 */
export type SessionState = 'unauthenticated' | 'authenticated' | 'invalid';

/**
 * Query string values. Undefined entries are dropped.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Session construction options.
 */
export interface SessionOptions {
  /** API base URL (default https://api.github.com) */
  baseUrl?: string;
  /** Per-request timeout in milliseconds (default 30000) */
  timeoutMs?: number;
  /** Retries after the first attempt for idempotent requests (default 1) */
  maxRetries?: number;
  /** Initial backoff delay in milliseconds (default 500) */
  retryDelayMs?: number;
  /** Logger for request tracing (default: the 'session' component logger) */
  logger?: Logger;
}

/**
 * Per-request options.
 */
export interface SendOptions {
  /** Query parameters appended to the path */
  query?: QueryParams;
  /**
   * Retry on NetworkError. Defaults to true for GET/HEAD/OPTIONS and false for
   * mutating methods; pass true for a mutating call only after the operator
   * has confirmed the repeat.
   */
  allowRetry?: boolean;
  /** Extra request headers */
  headers?: Record<string, string>;
}

/**
 * Minimal header reader shared by fetch Headers and test doubles.
 */
export interface HeaderReader {
  get(name: string): string | null;
}

/**
 * Parsed response.
 */
export interface ApiResponse<T> {
  status: number;
  headers: HeaderReader;
  /** Parsed JSON, raw text for non-JSON bodies, undefined for empty bodies */
  data: T;
}
