/**
 * Redaction utilities.
 *
 * Everything that can leave the process (log records, error messages,
 * terminal output) passes through here when it may carry a credential.
 */

import { CLI_SECURITY } from '../constants.js';

/**
 * Header names whose values are credentials.
 */
const SENSITIVE_HEADERS = new Set(['authorization', 'proxy-authorization', 'cookie', 'set-cookie']);

/**
 * Replace every occurrence of `secret` in `text`.
 * Empty secrets leave the text unchanged.
 */
export function redactSecret(text: string, secret: string | undefined): string {
  if (!secret) {
    return text;
  }
  return text.split(secret).join(CLI_SECURITY.REDACTED);
}

/**
 * Copy a header map with credential-bearing values censored.
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    redacted[name] = SENSITIVE_HEADERS.has(name.toLowerCase()) ? CLI_SECURITY.REDACTED : value;
  }
  return redacted;
}

/**
 * Truncate text for previews (error bodies, log lines).
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}
