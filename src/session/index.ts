/**
 * API session module.
 */

export { ApiSession, openSession, isIdempotentMethod } from './session.js';
export { isRateLimitResponse, parseRetryAfter } from './rate-limit.js';
export type {
  ApiResponse,
  HeaderReader,
  HttpMethod,
  QueryParams,
  SendOptions,
  SessionOptions,
  SessionState,
} from './types.js';
