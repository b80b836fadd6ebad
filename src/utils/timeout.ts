/**
 * Timeout helpers for outbound requests.
 */

import { getLogger } from '../logging/logger.js';

/**
 * Abort reason used when a request exceeds its time budget.
 */
export class TimeoutError extends Error {
  readonly operationName: string;
  readonly timeoutMs: number;

  constructor(operationName: string, timeoutMs: number, message?: string) {
    super(message ?? `${operationName} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.operationName = operationName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Sleep for the specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create an abort controller that automatically aborts after a timeout.
 *
 * @param timeoutMs - Timeout in milliseconds
 * @param operationName - Name of the operation
 * @returns AbortController and cleanup function
 */
export function createTimeoutAbortController(
  timeoutMs: number,
  operationName: string
): { controller: AbortController; cleanup: () => void } {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    getLogger('timeout').debug({ operationName, timeoutMs }, 'Aborting due to timeout');
    controller.abort(new TimeoutError(operationName, timeoutMs));
  }, timeoutMs);

  return {
    controller,
    cleanup: () => clearTimeout(timeoutId),
  };
}

/**
 * Whether an abort signal fired because of its timeout.
 */
export function isTimeoutAbort(signal: AbortSignal): boolean {
  return signal.aborted && signal.reason instanceof TimeoutError;
}
