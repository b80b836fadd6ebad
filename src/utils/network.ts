/**
 * Network utility functions.
 */

import { CLI_SECURITY } from '../constants.js';
import { ConfigError } from '../errors/types.js';

const BASE_URL_CONTEXT = { component: 'network', metadata: { setting: 'github.baseUrl' } };

/**
 * Check if a hostname is localhost.
 *
 * @param hostname - The hostname to check (from URL.hostname)
 * @returns true if the hostname is localhost
 */
export function isLocalhost(hostname: string): boolean {
  return CLI_SECURITY.LOCALHOST_HOSTS.some((host) => host === hostname);
}

/**
 * Reject base URLs that would send credentials in clear text.
 * HTTP is only allowed for localhost (local proxies and test servers).
 */
export function assertSecureUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new ConfigError(
      `Invalid URL: ${url}`,
      BASE_URL_CONTEXT,
      error instanceof Error ? error : undefined
    );
  }

  if (parsed.protocol !== 'https:' && !(parsed.protocol === 'http:' && isLocalhost(parsed.hostname))) {
    throw new ConfigError(
      `Insecure URL rejected: ${url}. ` +
        'Credentials are only sent over HTTPS. ' +
        'HTTP is only allowed for localhost.',
      BASE_URL_CONTEXT
    );
  }
}

/**
 * Join a base URL and an API path, appending query parameters.
 * Undefined query values are skipped.
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  query?: Record<string, string | number | boolean | undefined>
): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${normalizedPath}`);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
  }
  return url.toString();
}

/**
 * Encode each segment of a repository-relative file path.
 */
export function encodePath(path: string): string {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}
