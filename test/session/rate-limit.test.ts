import { describe, it, expect } from 'vitest';
import { isRateLimitResponse, parseRetryAfter } from '../../src/session/rate-limit.js';

describe('session/rate-limit', () => {
  describe('isRateLimitResponse', () => {
    it('should always treat 429 as throttling', () => {
      expect(isRateLimitResponse(429, new Headers())).toBe(true);
    });

    it('should treat 403 with an exhausted quota as throttling', () => {
      expect(isRateLimitResponse(403, new Headers({ 'x-ratelimit-remaining': '0' }))).toBe(true);
    });

    it('should treat 403 with Retry-After as a secondary limit', () => {
      expect(isRateLimitResponse(403, new Headers({ 'retry-after': '60' }))).toBe(true);
    });

    it('should treat 403 mentioning the rate limit as throttling', () => {
      expect(
        isRateLimitResponse(403, new Headers(), 'You have exceeded a secondary rate limit')
      ).toBe(true);
    });

    it('should not treat a permission 403 as throttling', () => {
      expect(
        isRateLimitResponse(403, new Headers({ 'x-ratelimit-remaining': '4999' }), 'Must have admin rights')
      ).toBe(false);
    });

    it('should ignore other statuses', () => {
      expect(isRateLimitResponse(500, new Headers({ 'retry-after': '5' }))).toBe(false);
      expect(isRateLimitResponse(401, new Headers({ 'x-ratelimit-remaining': '0' }))).toBe(false);
    });
  });

  describe('parseRetryAfter', () => {
    const now = Date.parse('2026-03-01T12:00:00Z');

    it('should read delta seconds', () => {
      expect(parseRetryAfter(new Headers({ 'retry-after': '120' }), now)).toBe(120000);
    });

    it('should read an HTTP date', () => {
      const headers = new Headers({ 'retry-after': 'Sun, 01 Mar 2026 12:00:30 GMT' });
      expect(parseRetryAfter(headers, now)).toBe(30000);
    });

    it('should fall back to the reset epoch', () => {
      const reset = String(now / 1000 + 45);
      expect(parseRetryAfter(new Headers({ 'x-ratelimit-reset': reset }), now)).toBe(45000);
    });

    it('should prefer Retry-After over the reset epoch', () => {
      const headers = new Headers({ 'retry-after': '10', 'x-ratelimit-reset': String(now / 1000 + 45) });
      expect(parseRetryAfter(headers, now)).toBe(10000);
    });

    it('should clamp past instants to 0', () => {
      const headers = new Headers({ 'x-ratelimit-reset': String(now / 1000 - 10) });
      expect(parseRetryAfter(headers, now)).toBe(0);
    });

    it('should return undefined when nothing usable is present', () => {
      expect(parseRetryAfter(new Headers(), now)).toBeUndefined();
      expect(parseRetryAfter(new Headers({ 'retry-after': 'soon' }), now)).toBeUndefined();
    });
  });
});
