/**
 * Credential guard - process-local custody of the active credential.
 *
 * The guard is the only place the secret lives after acquisition. It keeps
 * the secret in a Buffer it owns and zero-fills that buffer on release. It
 * never writes the credential to a file, an environment variable or a log.
 *
 * The string the caller handed to `hold()` is immutable and cannot be wiped;
 * dropping references to it is all JavaScript allows.
 */

import { GITHUB, SIGNAL_NUMBERS } from '../constants.js';
import { MissingCredentialError } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import { redactSecret } from '../utils/sanitize.js';
import type { Credential } from './credentials.js';

/**
 * The parts of `process` the exit hooks need.
 */
export interface ExitHookTarget {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  removeListener(event: string, listener: (...args: unknown[]) => void): unknown;
  exit(code?: number): void;
}

type GuardedSignal = keyof typeof SIGNAL_NUMBERS;

const GUARDED_SIGNALS: readonly GuardedSignal[] = ['SIGHUP', 'SIGINT', 'SIGTERM'];

export class CredentialGuard {
  private readonly logger = getLogger('guard');
  private heldIdentity: string | undefined;
  private secretBuffer: Buffer | undefined;

  /**
   * Take custody of a credential, releasing any previously held one.
   */
  hold(credential: Credential): void {
    if (this.secretBuffer) {
      this.release();
    }
    const buffer = Buffer.alloc(Buffer.byteLength(credential.secret, 'utf8'));
    buffer.write(credential.secret, 'utf8');
    this.secretBuffer = buffer;
    this.heldIdentity = credential.identity;
    this.logger.debug({ identity: credential.identity }, 'Credential held');
  }

  /**
   * Zero-fill and drop the held secret. Safe to call repeatedly.
   */
  release(): void {
    if (this.secretBuffer) {
      this.secretBuffer.fill(0);
      this.secretBuffer = undefined;
      this.logger.debug({ identity: this.heldIdentity }, 'Credential released');
    }
    this.heldIdentity = undefined;
  }

  get isHeld(): boolean {
    return this.secretBuffer !== undefined;
  }

  /**
   * Account handle of the held credential.
   */
  get identity(): string {
    if (this.heldIdentity === undefined) {
      throw new MissingCredentialError('credential');
    }
    return this.heldIdentity;
  }

  /**
   * Value for the Authorization header, built on demand from the buffer.
   */
  authorizationHeader(): string {
    return `${GITHUB.AUTH_SCHEME} ${this.readSecret()}`;
  }

  /**
   * Replace every occurrence of the held secret in `text`.
   */
  redact(text: string): string {
    if (!this.secretBuffer) {
      return text;
    }
    return redactSecret(text, this.readSecret());
  }

  /**
   * Release the credential when the process exits, including on SIGINT,
   * SIGTERM and SIGHUP. Uncaught exceptions end in 'exit' as well.
   *
   * @returns A disposer that removes the installed handlers
   */
  installExitHooks(target: ExitHookTarget = process): () => void {
    const onExit = (): void => {
      this.release();
    };
    const signalHandlers = new Map<GuardedSignal, () => void>();

    target.on('exit', onExit);
    for (const signal of GUARDED_SIGNALS) {
      const handler = (): void => {
        this.logger.debug({ signal }, 'Signal received, releasing credential');
        this.release();
        target.exit(128 + SIGNAL_NUMBERS[signal]);
      };
      signalHandlers.set(signal, handler);
      target.on(signal, handler);
    }

    return () => {
      target.removeListener('exit', onExit);
      for (const [signal, handler] of signalHandlers) {
        target.removeListener(signal, handler);
      }
    };
  }

  private readSecret(): string {
    if (!this.secretBuffer) {
      throw new MissingCredentialError('credential');
    }
    return this.secretBuffer.toString('utf8');
  }
}

/**
 * Hold a credential for the duration of `fn`, releasing it on every exit
 * path (return, throw, early return inside `fn`).
 */
export async function withCredential<T>(
  credential: Credential,
  fn: (guard: CredentialGuard) => Promise<T>,
  guard: CredentialGuard = new CredentialGuard()
): Promise<T> {
  guard.hold(credential);
  try {
    return await fn(guard);
  } finally {
    guard.release();
  }
}
