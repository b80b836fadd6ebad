/**
 * Centralized version management.
 *
 * All version references should import from this module rather than
 * hardcoding the version string.
 */

import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { existsSync, readFileSync } from 'fs';

// Should match package.json
const FALLBACK_VERSION = '0.3.0';

/**
 * Get the package version.
 *
 * Walks up from this module to the nearest package.json, which works from
 * src/ during development and from dist/src/ once built.
 */
function getPackageVersion(): string {
  try {
    // First try npm_package_version (works when run via npm scripts)
    if (process.env.npm_package_version) {
      return process.env.npm_package_version;
    }

    let dir = dirname(fileURLToPath(import.meta.url));
    for (let depth = 0; depth < 3; depth++) {
      const packagePath = join(dir, '..', 'package.json');
      if (existsSync(packagePath)) {
        const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
        if (
          typeof packageJson === 'object' &&
          packageJson !== null &&
          'version' in packageJson &&
          typeof packageJson.version === 'string'
        ) {
          return packageJson.version;
        }
      }
      dir = join(dir, '..');
    }
  } catch {
    return FALLBACK_VERSION;
  }
  return FALLBACK_VERSION;
}

/**
 * The current octoterm version.
 */
export const VERSION = getPackageVersion();

/**
 * Package name.
 */
export const PACKAGE_NAME = 'octoterm';

/**
 * User-Agent string for HTTP requests. GitHub rejects requests without one.
 */
export const USER_AGENT = `${PACKAGE_NAME}/${VERSION}`;
