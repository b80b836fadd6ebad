/**
 * Authentication module - credential acquisition and custody.
 */

export {
  acquireStatic,
  acquireInteractive,
  acquireCredential,
  resolveStaticValues,
  resolveStaticCredential,
  describeCredentialSource,
  type Credential,
  type CredentialSource,
  type ResolvedCredential,
  type StaticCredentialOptions,
  type AcquireCredentialOptions,
} from './credentials.js';

export { CredentialGuard, withCredential, type ExitHookTarget } from './guard.js';

export { createTerminalPrompter, type Prompter, type TerminalPrompterOptions } from './prompt.js';
