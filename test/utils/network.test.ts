import { describe, it, expect } from 'vitest';
import { assertSecureUrl, buildUrl, encodePath, isLocalhost } from '../../src/utils/network.js';
import { ConfigError } from '../../src/errors/types.js';

describe('utils/network', () => {
  describe('isLocalhost', () => {
    it('should recognise loopback names', () => {
      expect(isLocalhost('localhost')).toBe(true);
      expect(isLocalhost('127.0.0.1')).toBe(true);
      expect(isLocalhost('[::1]')).toBe(true);
    });

    it('should reject other hosts', () => {
      expect(isLocalhost('api.github.com')).toBe(false);
      expect(isLocalhost('localhost.example.com')).toBe(false);
    });
  });

  describe('assertSecureUrl', () => {
    it('should accept https', () => {
      expect(() => assertSecureUrl('https://api.github.com')).not.toThrow();
      expect(() => assertSecureUrl('https://ghe.example.com/api/v3')).not.toThrow();
    });

    it('should accept http on localhost only', () => {
      expect(() => assertSecureUrl('http://localhost:8080')).not.toThrow();
      expect(() => assertSecureUrl('http://127.0.0.1')).not.toThrow();
      expect(() => assertSecureUrl('http://api.github.com')).toThrow(
        'Insecure URL rejected: http://api.github.com.'
      );
    });

    it('should reject unparseable URLs', () => {
      expect(() => assertSecureUrl('api.github.com')).toThrow('Invalid URL: api.github.com');
    });

    it('should report rejected URLs as configuration errors', () => {
      expect(() => assertSecureUrl('http://api.github.com')).toThrow(ConfigError);
      expect(() => assertSecureUrl('not a url')).toThrow(ConfigError);
    });
  });

  describe('buildUrl', () => {
    it('should join base and path', () => {
      expect(buildUrl('https://api.github.com/', '/user')).toBe('https://api.github.com/user');
      expect(buildUrl('https://ghe.example.com/api/v3', 'user/repos')).toBe(
        'https://ghe.example.com/api/v3/user/repos'
      );
    });

    it('should append defined query values', () => {
      expect(buildUrl('https://api.github.com', '/user/repos', { per_page: 100, page: undefined, all: true })).toBe(
        'https://api.github.com/user/repos?per_page=100&all=true'
      );
    });

    it('should escape query values', () => {
      expect(buildUrl('https://api.github.com', '/repos/a/b/contents/x', { ref: 'feature/one two' })).toBe(
        'https://api.github.com/repos/a/b/contents/x?ref=feature%2Fone+two'
      );
    });
  });

  describe('encodePath', () => {
    it('should encode each segment and keep separators', () => {
      expect(encodePath('docs/my notes/a#1.md')).toBe('docs/my%20notes/a%231.md');
    });

    it('should drop empty segments', () => {
      expect(encodePath('/docs//readme.md/')).toBe('docs/readme.md');
    });
  });
});
