import { EXIT_CODES, GITHUB } from '../../constants.js';
import {
  ConfigError,
  InputAbortedError,
  MissingCredentialError,
  NetworkError,
  RateLimitedError,
  RemoteError,
  UnauthorizedError,
  getErrorMessage,
} from '../../errors/types.js';
import * as output from '../output.js';

/**
 * Process exit code for an error that ended a command.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof InputAbortedError) {
    return EXIT_CODES.ABORTED;
  }
  if (error instanceof MissingCredentialError) {
    return EXIT_CODES.MISSING_CREDENTIAL;
  }
  if (error instanceof UnauthorizedError) {
    return EXIT_CODES.UNAUTHORIZED;
  }
  if (error instanceof RateLimitedError) {
    return EXIT_CODES.RATE_LIMITED;
  }
  if (error instanceof NetworkError) {
    return EXIT_CODES.NETWORK;
  }
  return EXIT_CODES.ERROR;
}

/**
 * Remediation lines for an error, empty when there is nothing to add.
 */
export function errorHints(error: unknown, tokenEnvVar: string = GITHUB.TOKEN_ENV_VAR): string[] {
  if (error instanceof MissingCredentialError) {
    return [
      `  - Export ${tokenEnvVar} (or add it to .env) and GITHUB_USERNAME`,
      '  - Or run without --no-input to be prompted',
      `  - Create a token at ${GITHUB.TOKEN_SETTINGS_URL}`,
    ];
  }

  if (error instanceof UnauthorizedError) {
    return [
      '  - The token is invalid, expired or revoked',
      `  - Create a new token at ${GITHUB.TOKEN_SETTINGS_URL}`,
      '  - Restart octoterm with the new token',
    ];
  }

  if (error instanceof RateLimitedError) {
    const lines = ['  - GitHub is throttling this account'];
    if (error.retryAfterMs !== undefined) {
      lines.push(`  - Wait ${Math.ceil(error.retryAfterMs / 1000)}s before retrying`);
    }
    return lines;
  }

  if (error instanceof NetworkError) {
    if (error.code === 'NETWORK_TIMEOUT') {
      return [
        '  - GitHub is taking too long to respond',
        '  - Increase request.timeout in octoterm.yaml or pass --timeout',
      ];
    }
    return [
      '  - Check your internet connection',
      '  - Check github.baseUrl in octoterm.yaml',
    ];
  }

  if (error instanceof RemoteError) {
    switch (error.status) {
      case 403:
        return ['  - The token lacks the scope this operation needs (repo, workflow, gist, notifications)'];
      case 404:
        return [
          '  - Check the repository and path names',
          '  - Private resources also answer 404 when the token lacks access',
        ];
      case 422:
        return ['  - GitHub rejected the input; see the details above'];
      default:
        return error.documentationUrl ? [`  - See ${error.documentationUrl}`] : [];
    }
  }

  if (error instanceof ConfigError) {
    if (error.context.metadata?.setting === 'github.baseUrl') {
      return ['  - Set github.baseUrl in octoterm.yaml to an https:// URL'];
    }
    return ['  - Run `octoterm init` to generate a valid octoterm.yaml'];
  }

  return [];
}

/**
 * Print an error with its remediation hints.
 */
export function printError(error: unknown, tokenEnvVar?: string): void {
  output.error(`${output.symbols.failure()} Error: ${getErrorMessage(error)}`);
  const hints = errorHints(error, tokenEnvVar);
  if (hints.length > 0) {
    output.error('\nPossible fixes:');
    for (const hint of hints) {
      output.error(hint);
    }
  }
}
