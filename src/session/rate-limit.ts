/**
 * Rate-limit detection for GitHub responses.
 *
 * GitHub signals throttling with 429, or with 403 plus either an exhausted
 * primary quota (x-ratelimit-remaining: 0), a Retry-After header (secondary
 * limits), or a message mentioning the rate limit.
 */

import { RATE_LIMIT_HEADERS } from '../constants.js';
import type { HeaderReader } from './types.js';

/**
 * Whether a response is GitHub throttling the caller.
 */
export function isRateLimitResponse(
  status: number,
  headers: HeaderReader,
  message?: string
): boolean {
  if (status === 429) {
    return true;
  }
  if (status !== 403) {
    return false;
  }
  return (
    headers.get(RATE_LIMIT_HEADERS.REMAINING) === '0' ||
    headers.get(RATE_LIMIT_HEADERS.RETRY_AFTER) !== null ||
    (message !== undefined && /rate limit/i.test(message))
  );
}

/**
 * Milliseconds to wait before retrying, when the response says.
 *
 * Retry-After (delta seconds or HTTP date) wins over x-ratelimit-reset
 * (epoch seconds). Past instants clamp to 0.
 */
export function parseRetryAfter(headers: HeaderReader, now: number = Date.now()): number | undefined {
  const retryAfter = headers.get(RATE_LIMIT_HEADERS.RETRY_AFTER)?.trim();
  if (retryAfter) {
    if (/^\d+$/.test(retryAfter)) {
      return Number.parseInt(retryAfter, 10) * 1000;
    }
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) {
      return Math.max(0, date - now);
    }
  }

  const reset = headers.get(RATE_LIMIT_HEADERS.RESET)?.trim();
  if (reset && /^\d+$/.test(reset)) {
    return Math.max(0, Number.parseInt(reset, 10) * 1000 - now);
  }

  return undefined;
}
