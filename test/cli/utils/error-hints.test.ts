import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { configureOutput, resetOutput } from '../../../src/cli/output.js';
import { errorHints, exitCodeFor, printError } from '../../../src/cli/utils/error-hints.js';
import { assertSecureUrl } from '../../../src/utils/network.js';
import {
  ConfigValidationError,
  InputAbortedError,
  InvalidInputError,
  MissingCredentialError,
  NetworkError,
  RateLimitedError,
  RemoteError,
  UnauthorizedError,
} from '../../../src/errors/types.js';

describe('cli/utils/error-hints', () => {
  describe('exitCodeFor', () => {
    it('should map each failure to its exit code', () => {
      expect(exitCodeFor(new InputAbortedError())).toBe(130);
      expect(exitCodeFor(new MissingCredentialError('secret'))).toBe(2);
      expect(exitCodeFor(new UnauthorizedError('rejected'))).toBe(3);
      expect(exitCodeFor(new RateLimitedError(429))).toBe(4);
      expect(exitCodeFor(new NetworkError('reset'))).toBe(5);
      expect(exitCodeFor(new RemoteError(404, {}))).toBe(1);
      expect(exitCodeFor(new Error('other'))).toBe(1);
    });
  });

  describe('errorHints', () => {
    it('should name the token variable for missing credentials', () => {
      expect(errorHints(new MissingCredentialError('secret'), 'WORK_GITHUB_TOKEN')[0]).toBe(
        '  - Export WORK_GITHUB_TOKEN (or add it to .env) and GITHUB_USERNAME'
      );
    });

    it('should include the wait for rate limits', () => {
      expect(errorHints(new RateLimitedError(403, 30000))).toEqual([
        '  - GitHub is throttling this account',
        '  - Wait 30s before retrying',
      ]);
    });

    it('should suggest a longer timeout after a timeout', () => {
      expect(errorHints(new NetworkError('Request timed out after 30000ms', 30000))).toEqual([
        '  - GitHub is taking too long to respond',
        '  - Increase request.timeout in octoterm.yaml or pass --timeout',
      ]);
    });

    it('should explain 404s on private resources', () => {
      expect(errorHints(new RemoteError(404, { message: 'Not Found' }))).toHaveLength(2);
    });

    it('should link documentation for other remote errors', () => {
      expect(errorHints(new RemoteError(409, { documentationUrl: 'https://docs.github.com/rest' }))).toEqual([
        '  - See https://docs.github.com/rest',
      ]);
    });

    it('should point at init for configuration errors', () => {
      expect(errorHints(new ConfigValidationError('octoterm.yaml', ['x']))).toEqual([
        '  - Run `octoterm init` to generate a valid octoterm.yaml',
      ]);
    });

    it('should point at github.baseUrl for a rejected base URL', () => {
      let rejected: unknown;
      try {
        assertSecureUrl('http://github.example.com');
      } catch (error) {
        rejected = error;
      }

      expect(exitCodeFor(rejected)).toBe(1);
      expect(errorHints(rejected)).toEqual(['  - Set github.baseUrl in octoterm.yaml to an https:// URL']);
    });

    it('should have nothing to add for input errors', () => {
      expect(errorHints(new InvalidInputError('Repository name is required'))).toEqual([]);
    });
  });

  describe('printError', () => {
    let consoleErrorSpy: MockInstance<typeof console.error>;

    beforeEach(() => {
      configureOutput({ noColor: true });
      consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      consoleErrorSpy.mockRestore();
      resetOutput();
    });

    it('should print the message followed by the hints', () => {
      printError(new UnauthorizedError('GitHub rejected the credentials: Bad credentials'));

      expect(consoleErrorSpy.mock.calls.map((call) => call[0])).toEqual([
        '✗ Error: GitHub rejected the credentials: Bad credentials',
        '\nPossible fixes:',
        '  - The token is invalid, expired or revoked',
        '  - Create a new token at https://github.com/settings/tokens',
        '  - Restart octoterm with the new token',
      ]);
    });

    it('should print only the message when there are no hints', () => {
      printError('plain failure');

      expect(consoleErrorSpy.mock.calls).toEqual([['✗ Error: plain failure']]);
    });
  });
});
