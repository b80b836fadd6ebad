import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { withRetry, calculateDelay, READ_RETRY_OPTIONS } from '../../src/errors/retry.js';
import {
  OctotermError,
  NetworkError,
  RateLimitedError,
  RemoteError,
  UnauthorizedError,
} from '../../src/errors/types.js';
import { resetLogger, configureLogger } from '../../src/logging/logger.js';

describe('errors/retry', () => {
  beforeEach(() => {
    configureLogger({ level: 'silent' });
  });

  afterEach(() => {
    resetLogger();
    vi.restoreAllMocks();
  });

  describe('withRetry', () => {
    it('should succeed on first attempt', async () => {
      const fn = vi.fn().mockResolvedValue('success');

      const result = await withRetry(fn, { maxAttempts: 3 });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on retryable error', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new NetworkError('Network request failed: fetch failed'))
        .mockResolvedValue('success');

      const result = await withRetry(fn, {
        maxAttempts: 3,
        initialDelayMs: 10,
        jitter: false,
      });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should not retry on terminal error', async () => {
      const fn = vi.fn().mockRejectedValue(new UnauthorizedError('Bad credentials'));

      await expect(
        withRetry(fn, { maxAttempts: 3, initialDelayMs: 10, jitter: false })
      ).rejects.toThrow(UnauthorizedError);

      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should not exceed maxAttempts', async () => {
      const fn = vi.fn().mockRejectedValue(new NetworkError('Request timed out after 5000ms', 5000));

      await expect(
        withRetry(fn, { maxAttempts: 3, initialDelayMs: 10, jitter: false })
      ).rejects.toThrow('Request timed out after 5000ms');

      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should calculate exponential backoff correctly', async () => {
      const delays: number[] = [];
      const fn = vi.fn().mockRejectedValue(new NetworkError('reset'));

      await expect(
        withRetry(fn, {
          maxAttempts: 4,
          initialDelayMs: 10,
          backoffMultiplier: 2,
          jitter: false,
          onRetry: (_error, _attempt, delayMs) => {
            delays.push(delayMs);
          },
        })
      ).rejects.toThrow();

      expect(delays).toEqual([10, 20, 40]);
    });

    it('should cap delay at maxDelayMs', async () => {
      const delays: number[] = [];
      const fn = vi.fn().mockRejectedValue(new NetworkError('reset'));

      await expect(
        withRetry(fn, {
          maxAttempts: 5,
          initialDelayMs: 10,
          maxDelayMs: 30,
          backoffMultiplier: 2,
          jitter: false,
          onRetry: (_error, _attempt, delayMs) => {
            delays.push(delayMs);
          },
        })
      ).rejects.toThrow();

      expect(delays).toEqual([10, 20, 30, 30]);
    });

    it('should wait the server-provided delay for rate limits', async () => {
      const delays: number[] = [];
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new RateLimitedError(429, 15))
        .mockResolvedValue('success');

      await withRetry(fn, {
        maxAttempts: 2,
        initialDelayMs: 1000,
        onRetry: (_error, _attempt, delayMs) => {
          delays.push(delayMs);
        },
      });

      expect(delays).toEqual([15]);
    });

    it('should call onRetry callback with correct params', async () => {
      const onRetry = vi.fn();
      const error = new NetworkError('reset');
      const fn = vi.fn().mockRejectedValueOnce(error).mockResolvedValue('success');

      await withRetry(fn, {
        maxAttempts: 3,
        initialDelayMs: 10,
        jitter: false,
        onRetry,
      });

      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(onRetry).toHaveBeenCalledWith(error, 1, 10);
    });

    it('should keep the class of typed errors', async () => {
      const error = new RemoteError(500, { message: 'Server Error' });
      const fn = vi.fn().mockRejectedValue(error);

      await expect(withRetry(fn, { maxAttempts: 2, initialDelayMs: 1 })).rejects.toBe(error);
    });

    it('should wrap unknown errors with the operation', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('disk full'));

      const error = await withRetry(fn, {
        maxAttempts: 1,
        operation: 'write config',
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OctotermError);
      expect(error).toMatchObject({
        code: 'UNKNOWN_ERROR',
        message: 'disk full',
        context: { operation: 'write config', retry: { attempt: 1, maxAttempts: 1 } },
      });
    });

    it('should honour a custom retry condition', async () => {
      const fn = vi.fn().mockRejectedValue(new NetworkError('reset'));

      await expect(
        withRetry(fn, { maxAttempts: 3, initialDelayMs: 1, shouldRetry: () => false })
      ).rejects.toThrow(NetworkError);

      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  describe('READ_RETRY_OPTIONS', () => {
    it('should retry network failures only', () => {
      const shouldRetry = READ_RETRY_OPTIONS.shouldRetry;

      expect(shouldRetry?.(new NetworkError('reset'), 1)).toBe(true);
      expect(shouldRetry?.(new RateLimitedError(429, 1000), 1)).toBe(false);
      expect(shouldRetry?.(new RemoteError(502, {}), 1)).toBe(false);
      expect(shouldRetry?.(new Error('fetch failed'), 1)).toBe(false);
    });

    it('should allow one retry after the first attempt', () => {
      expect(READ_RETRY_OPTIONS.maxAttempts).toBe(2);
    });
  });

  describe('calculateDelay', () => {
    it('should grow exponentially without jitter', () => {
      expect(calculateDelay(1, 500, 10000, 2, false)).toBe(500);
      expect(calculateDelay(3, 500, 10000, 2, false)).toBe(2000);
    });

    it('should stay within 25% when jittered', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0.75);

      expect(calculateDelay(1, 100, 10000, 2, true)).toBe(112.5);
    });
  });
});
