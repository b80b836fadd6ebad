/**
 * Retry logic with exponential backoff.
 */

import { getLogger } from '../logging/logger.js';
import { RETRY } from '../constants.js';
import { sleep } from '../utils/timeout.js';
import {
  NetworkError,
  RateLimitedError,
  getErrorMessage,
  isRetryable,
  wrapError,
  createTimingContext,
  type ErrorContext,
} from './types.js';

/**
 * Retry options.
 */
export interface RetryOptions {
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Add jitter to delays (default: true) */
  jitter?: boolean;
  /** Custom retry condition (default: isRetryable) */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Callback on retry (for logging) */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Operation name for logging */
  operation?: string;
  /** Additional context for errors */
  context?: ErrorContext;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'shouldRetry' | 'onRetry' | 'operation' | 'context'>> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
};

/**
 * Calculate delay with exponential backoff and optional jitter.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitter: boolean
): number {
  // Exponential backoff: delay = initial * multiplier^(attempt - 1)
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  const clampedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (jitter) {
    // Add random jitter: ±25% of the delay
    const jitterRange = clampedDelay * 0.25;
    const jitterAmount = Math.random() * jitterRange * 2 - jitterRange;
    return Math.max(0, clampedDelay + jitterAmount);
  }

  return clampedDelay;
}

type BackoffSettings = Pick<
  Required<RetryOptions>,
  'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitter'
>;

/**
 * Wait before the next attempt. A rate limit that names its reset wins over
 * the backoff curve, capped at `maxDelayMs`.
 */
function delayBeforeRetry(error: unknown, attempt: number, backoff: BackoffSettings): number {
  if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, backoff.maxDelayMs);
  }
  return calculateDelay(
    attempt,
    backoff.initialDelayMs,
    backoff.maxDelayMs,
    backoff.backoffMultiplier,
    backoff.jitter
  );
}

/**
 * Call `fn` until it succeeds, `shouldRetry` declines, or the attempts run
 * out. The final error goes through `wrapError`, so typed errors keep their
 * class and gain operation, timing and attempt context.
 *
 * @example
 * ```typescript
 * const user = await withRetry(
 *   () => session.send('GET', '/user'),
 *   { ...READ_RETRY_OPTIONS, operation: 'GET /user' }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_OPTIONS.maxAttempts);
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const operation = options.operation ?? 'operation';
  const backoff: BackoffSettings = {
    initialDelayMs: options.initialDelayMs ?? DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_OPTIONS.backoffMultiplier,
    jitter: options.jitter ?? DEFAULT_OPTIONS.jitter,
  };
  const logger = getLogger('retry');
  const startedAt = new Date();

  let attempt = 1;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        const final = wrapError(error, {
          ...options.context,
          operation,
          timing: createTimingContext(startedAt),
          retry: { attempt, maxAttempts },
        });
        if (attempt > 1) {
          logger.warn({ operation, attempts: attempt, code: final.code }, `${operation} gave up`);
        }
        throw final;
      }

      const delayMs = delayBeforeRetry(error, attempt, backoff);
      logger.debug(
        { operation, attempt, maxAttempts, delayMs: Math.round(delayMs), reason: getErrorMessage(error) },
        `Retrying ${operation}`
      );
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
      attempt += 1;
    }
  }
}

/**
 * Retry options for idempotent GitHub reads: transport failures only.
 *
 * Rate limiting is surfaced to the caller with its retry-after instead of
 * being waited out here.
 */
export const READ_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: RETRY.MAX_RETRIES + 1,
  initialDelayMs: RETRY.INITIAL_DELAY_MS,
  maxDelayMs: RETRY.MAX_DELAY_MS,
  backoffMultiplier: 2,
  jitter: true,
  shouldRetry: (error) => error instanceof NetworkError,
};
