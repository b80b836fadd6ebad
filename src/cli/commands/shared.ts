/**
 * Shared plumbing for commands that talk to GitHub.
 *
 * Opening a command context resolves configuration, acquires the credential,
 * places it in a guard that is released on exit or signal, and verifies it
 * against GitHub before any command runs.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import {
  acquireCredential,
  describeCredentialSource,
  type ResolvedCredential,
} from '../../auth/credentials.js';
import { CredentialGuard, type ExitHookTarget } from '../../auth/guard.js';
import { createTerminalPrompter, type Prompter } from '../../auth/prompt.js';
import { loadConfig, type OctotermConfig } from '../../config/loader.js';
import { TIMEOUTS } from '../../constants.js';
import { ConfigValidationError } from '../../errors/types.js';
import { GitHubClient } from '../../github/client.js';
import type { GitHubUser } from '../../github/types.js';
import { configureLogger, getLogger } from '../../logging/logger.js';
import { ApiSession } from '../../session/session.js';
import * as output from '../output.js';
import { exitCodeFor, printError } from '../utils/error-hints.js';

const globalOptionsSchema = z.object({
  config: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  input: z.boolean().default(true),
  timeout: z.coerce.number().int().min(TIMEOUTS.MIN_REQUEST).max(TIMEOUTS.MAX_REQUEST).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  logFile: z.string().min(1).optional(),
  color: z.boolean().default(true),
  quiet: z.boolean().default(false),
});

/**
 * Options accepted by every command.
 */
export type GlobalOptions = z.infer<typeof globalOptionsSchema>;

/**
 * Validate the program-level options commander collected.
 *
 * @throws ConfigValidationError listing every rejected option
 */
export function parseGlobalOptions(raw: Record<string, unknown>): GlobalOptions {
  const result = globalOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      'command-line options',
      result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Everything a GitHub command needs once the credential is verified.
 */
export interface CommandContext {
  config: OctotermConfig;
  session: ApiSession;
  client: GitHubClient;
  user: GitHubUser;
  /** Whether the operator may be prompted */
  interactive: boolean;
  /** Prompter shared with credential entry, created on first use */
  prompter(): Prompter;
  /** Release the credential, remove exit hooks and close the prompter */
  close(): void;
}

/**
 * Seams for tests; production uses the process defaults.
 */
export interface ContextDependencies {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
  createPrompter?: () => Prompter;
  exitTarget?: ExitHookTarget;
}

/**
 * Resolve configuration, acquire and verify the credential.
 *
 * @throws MissingCredentialError, InputAbortedError, UnauthorizedError, ConfigError
 */
export async function openCommandContext(
  options: GlobalOptions,
  deps: ContextDependencies = {}
): Promise<CommandContext> {
  const config = loadConfig(options.config, { cwd: deps.cwd, homeDir: deps.homeDir });

  // Flags were applied before the action ran; otherwise the config file decides
  if (!options.logLevel && !options.logFile) {
    configureLogger({
      level: config.logging.level,
      file: config.logging.file,
      pretty: config.logging.pretty,
    });
  }
  const logger = getLogger('cli');

  let prompter: Prompter | undefined;
  const getPrompter = (): Prompter => {
    if (!prompter) {
      prompter = deps.createPrompter ? deps.createPrompter() : createTerminalPrompter();
    }
    return prompter;
  };
  const closePrompter = (): void => {
    prompter?.close();
  };

  let resolved: ResolvedCredential;
  try {
    resolved = await acquireCredential({
      identity: options.username,
      configIdentity: config.github.username,
      tokenEnvVar: config.github.tokenEnvVar,
      env: deps.env,
      cwd: deps.cwd,
      homeDir: deps.homeDir,
      interactive: options.input,
      createPrompter: getPrompter,
    });
  } catch (error) {
    closePrompter();
    throw error;
  }
  logger.debug(
    {
      identitySource: describeCredentialSource(resolved.identitySource),
      secretSource: describeCredentialSource(resolved.secretSource, config.github.tokenEnvVar),
    },
    'Credential acquired'
  );

  const guard = new CredentialGuard();
  guard.hold(resolved.credential);
  const removeExitHooks = guard.installExitHooks(deps.exitTarget);
  const close = (): void => {
    removeExitHooks();
    guard.release();
    closePrompter();
  };

  try {
    const session = new ApiSession(guard, {
      baseUrl: config.github.baseUrl,
      timeoutMs: options.timeout ?? config.request.timeout,
      maxRetries: config.request.maxRetries,
      retryDelayMs: config.request.retryDelayMs,
    });
    const client = new GitHubClient(session);

    output.info(output.dim('Verifying credentials...'));
    const user = await client.verifyCredentials();
    output.success(`Authenticated as ${user.login}`);

    return {
      config,
      session,
      client,
      user,
      interactive: options.input,
      prompter: getPrompter,
      close,
    };
  } catch (error) {
    close();
    throw error;
  }
}

/**
 * Run `fn` with a verified context, always releasing the credential after.
 */
export async function withCommandContext(
  command: Command,
  fn: (ctx: CommandContext) => Promise<void>
): Promise<void> {
  const options = parseGlobalOptions(command.optsWithGlobals());
  const ctx = await openCommandContext(options);
  try {
    await fn(ctx);
  } finally {
    ctx.close();
  }
}

/**
 * Report a command failure and set the exit code for it.
 */
export function failCommand(error: unknown): void {
  printError(error);
  process.exitCode = exitCodeFor(error);
}

/**
 * Action body for commands that call GitHub. With `json`, progress output is
 * silenced so stdout carries only the JSON document.
 */
export async function runGitHubCommand(
  command: Command,
  fn: (ctx: CommandContext) => Promise<void>,
  options: { json?: boolean } = {}
): Promise<void> {
  if (options.json) {
    output.configureOutput({ quiet: true });
  }
  try {
    await withCommandContext(command, fn);
  } catch (error) {
    failCommand(error);
  }
}
