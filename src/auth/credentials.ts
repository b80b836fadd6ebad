/**
 * Credential acquisition - username and personal access token.
 *
 * Static resolution order (highest to lowest priority):
 * 1. Explicit values (CLI flags or values embedded by a script)
 * 2. Environment variables (GITHUB_USERNAME, and GITHUB_TOKEN or tokenEnvVar)
 * 3. Project .env file (./.env in the current working directory)
 * 4. Global .env file (~/.octoterm/.env)
 * 5. Config file github.username (identity only)
 *
 * When the token is not configured anywhere, the operator is prompted.
 * .env files are parsed in place; nothing is copied into process.env.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseDotenv } from 'dotenv';
import { GITHUB, PATHS } from '../constants.js';
import { MissingCredentialError } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import type { Prompter } from './prompt.js';

/**
 * An account handle and its access token.
 */
export interface Credential {
  readonly identity: string;
  readonly secret: string;
}

/**
 * Where a credential half came from.
 */
export type CredentialSource =
  | 'explicit'
  | 'env'
  | 'project-env'
  | 'global-env'
  | 'config'
  | 'prompt'
  | 'none';

/**
 * A credential together with the provenance of each half.
 */
export interface ResolvedCredential {
  credential: Credential;
  identitySource: CredentialSource;
  secretSource: CredentialSource;
}

/**
 * Inputs for static resolution.
 */
export interface StaticCredentialOptions {
  /** Explicit username (e.g. --username) */
  identity?: string;
  /** Explicit token (embedded by a calling script) */
  secret?: string;
  /** github.username from the config file */
  configIdentity?: string;
  /** Environment variable holding the token (default GITHUB_TOKEN) */
  tokenEnvVar?: string;
  /** Environment to read (default process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory holding the project .env (default cwd) */
  cwd?: string;
  /** Home directory holding ~/.octoterm/.env (default os.homedir()) */
  homeDir?: string;
}

/**
 * Inputs for full acquisition.
 */
export interface AcquireCredentialOptions extends StaticCredentialOptions {
  /** Whether the operator may be prompted */
  interactive: boolean;
  /** Supplies the prompter when prompting is needed; the caller closes it */
  createPrompter: () => Prompter;
}

interface ResolvedValue {
  value: string;
  source: CredentialSource;
}

/**
 * Build a credential from pre-supplied values.
 *
 * @throws MissingCredentialError when either value is empty
 */
export function acquireStatic(identity: string, secret: string): Credential {
  const trimmedIdentity = identity.trim();
  const trimmedSecret = secret.trim();
  if (!trimmedIdentity) {
    throw new MissingCredentialError('identity');
  }
  if (!trimmedSecret) {
    throw new MissingCredentialError('secret');
  }
  return { identity: trimmedIdentity, secret: trimmedSecret };
}

/**
 * Prompt the operator for a username and token. The token is read without
 * echo. A known identity skips the username question.
 *
 * @throws InputAbortedError when the operator cancels
 * @throws MissingCredentialError when an answer is empty
 */
export async function acquireInteractive(
  prompter: Prompter,
  options: { identity?: string } = {}
): Promise<Credential> {
  const identity = options.identity ?? (await prompter.ask('Enter your GitHub username: '));
  if (!identity.trim()) {
    throw new MissingCredentialError('identity');
  }
  const secret = await prompter.askSecret('Enter your GitHub token: ');
  return acquireStatic(identity, secret);
}

/**
 * Read one variable from a dotenv file without touching process.env.
 */
function readEnvFile(filePath: string, key: string): string | undefined {
  if (!existsSync(filePath)) {
    return undefined;
  }
  try {
    const parsed = parseDotenv(readFileSync(filePath));
    const value = parsed[key]?.trim();
    return value ? value : undefined;
  } catch (error) {
    getLogger('credentials').warn(
      { file: filePath, error: error instanceof Error ? error.message : String(error) },
      'Could not read env file'
    );
    return undefined;
  }
}

function firstDefined(candidates: Array<[string | undefined, CredentialSource]>): ResolvedValue | undefined {
  for (const [value, source] of candidates) {
    const trimmed = value?.trim();
    if (trimmed) {
      return { value: trimmed, source };
    }
  }
  return undefined;
}

/**
 * Resolve whichever credential halves are configured.
 */
export function resolveStaticValues(options: StaticCredentialOptions = {}): {
  identity?: ResolvedValue;
  secret?: ResolvedValue;
} {
  const env = options.env ?? process.env;
  const tokenEnvVar = options.tokenEnvVar ?? GITHUB.TOKEN_ENV_VAR;
  const projectEnvPath = join(options.cwd ?? process.cwd(), PATHS.ENV_FILENAME);
  const globalEnvPath = join(options.homeDir ?? homedir(), PATHS.CONFIG_DIR, PATHS.ENV_FILENAME);

  const identity = firstDefined([
    [options.identity, 'explicit'],
    [env[GITHUB.USERNAME_ENV_VAR], 'env'],
    [readEnvFile(projectEnvPath, GITHUB.USERNAME_ENV_VAR), 'project-env'],
    [readEnvFile(globalEnvPath, GITHUB.USERNAME_ENV_VAR), 'global-env'],
    [options.configIdentity, 'config'],
  ]);

  const secret = firstDefined([
    [options.secret, 'explicit'],
    [env[tokenEnvVar], 'env'],
    [readEnvFile(projectEnvPath, tokenEnvVar), 'project-env'],
    [readEnvFile(globalEnvPath, tokenEnvVar), 'global-env'],
  ]);

  return { identity, secret };
}

/**
 * Resolve a complete credential from static configuration.
 *
 * @returns The credential, or undefined when either half is not configured
 */
export function resolveStaticCredential(
  options: StaticCredentialOptions = {}
): ResolvedCredential | undefined {
  const { identity, secret } = resolveStaticValues(options);
  if (!identity || !secret) {
    return undefined;
  }
  return {
    credential: acquireStatic(identity.value, secret.value),
    identitySource: identity.source,
    secretSource: secret.source,
  };
}

/**
 * Acquire a credential for this process run: static configuration first,
 * then the interactive prompt (pre-filled with any configured username).
 *
 * @throws MissingCredentialError when nothing is configured and prompting is disabled
 * @throws InputAbortedError when the operator cancels the prompt
 */
export async function acquireCredential(options: AcquireCredentialOptions): Promise<ResolvedCredential> {
  const { identity, secret } = resolveStaticValues(options);

  if (identity && secret) {
    getLogger('credentials').debug(
      { identitySource: identity.source, secretSource: secret.source },
      'Using configured credential'
    );
    return {
      credential: acquireStatic(identity.value, secret.value),
      identitySource: identity.source,
      secretSource: secret.source,
    };
  }

  if (!options.interactive) {
    const tokenEnvVar = options.tokenEnvVar ?? GITHUB.TOKEN_ENV_VAR;
    throw identity
      ? new MissingCredentialError(
          'secret',
          `GitHub token not configured. Set ${tokenEnvVar} or run interactively.`
        )
      : new MissingCredentialError(
          'identity',
          `GitHub username not configured. Pass --username or set ${GITHUB.USERNAME_ENV_VAR}.`
        );
  }

  const prompter = options.createPrompter();
  if (secret) {
    const typedIdentity = await prompter.ask('Enter your GitHub username: ');
    return {
      credential: acquireStatic(typedIdentity, secret.value),
      identitySource: 'prompt',
      secretSource: secret.source,
    };
  }
  const credential = await acquireInteractive(prompter, { identity: identity?.value });
  return {
    credential,
    identitySource: identity?.source ?? 'prompt',
    secretSource: 'prompt',
  };
}

/**
 * Human-readable description of a credential source.
 */
export function describeCredentialSource(source: CredentialSource, tokenEnvVar?: string): string {
  switch (source) {
    case 'explicit':
      return 'Provided on the command line';
    case 'env':
      return `Environment variable${tokenEnvVar ? ` (${tokenEnvVar})` : ''}`;
    case 'project-env':
      return 'Project .env file';
    case 'global-env':
      return `Global .env file (~/${PATHS.CONFIG_DIR}/${PATHS.ENV_FILENAME})`;
    case 'config':
      return 'Configuration file';
    case 'prompt':
      return 'Entered at the prompt';
    case 'none':
      return 'Not configured';
  }
}
