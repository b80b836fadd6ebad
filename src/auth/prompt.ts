/**
 * Terminal prompts for credential entry.
 *
 * Secrets are read through a readline interface whose output is muted while
 * the answer is typed, so the token is never echoed. Ctrl+D and a closed
 * input stream reject the pending question with InputAbortedError.
 *
 * On a TTY readline owns Ctrl+C for as long as the interface is open, even
 * between questions. The prompter hands it back as a process SIGINT so the
 * credential guard's exit hook runs and an in-flight request is cut off.
 */

import * as readline from 'readline';
import { Writable } from 'stream';
import { InputAbortedError } from '../errors/types.js';

/**
 * Source of operator answers.
 */
export interface Prompter {
  /** Ask a question, echoing the answer. Resolves with the trimmed answer. */
  ask(question: string): Promise<string>;
  /** Ask a question, echoing the answer. Resolves with the untrimmed line. */
  askRaw(question: string): Promise<string>;
  /** Ask for a secret without echoing it. Resolves with the raw answer. */
  askSecret(question: string): Promise<string>;
  /** Release the underlying terminal. */
  close(): void;
}

/**
 * Streams a terminal prompter reads from and writes to.
 */
export interface TerminalPrompterOptions {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
  /** Called after Ctrl+C closed the prompter. Re-raises SIGINT by default. */
  onInterrupt?: () => void;
}

function raiseInterrupt(): void {
  process.kill(process.pid, 'SIGINT');
}

interface PendingQuestion {
  resolve: (answer: string) => void;
  reject: (error: Error) => void;
}

/**
 * Create a prompter bound to the given streams (stdin/stdout by default).
 *
 * Lines that arrive before a question is asked (piped input) are queued and
 * answer the next questions in order.
 */
export function createTerminalPrompter(options: TerminalPrompterOptions = {}): Prompter {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const onInterrupt = options.onInterrupt ?? raiseInterrupt;

  let muted = false;
  const mutableOutput = new Writable({
    write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      if (!muted) {
        output.write(chunk);
      }
      callback();
    },
  });

  let rl: readline.Interface | null = null;
  let closed = false;
  let pending: PendingQuestion | null = null;
  const queued: string[] = [];

  const unmute = (): void => {
    if (muted) {
      muted = false;
      output.write('\n');
    }
  };

  const abortPending = (reason: string): void => {
    const current = pending;
    pending = null;
    if (current) {
      unmute();
      current.reject(new InputAbortedError(reason));
    }
  };

  const getInterface = (): readline.Interface => {
    if (rl) {
      return rl;
    }
    const iface = readline.createInterface({
      input,
      output: mutableOutput,
      terminal: input.isTTY === true,
    });
    iface.on('line', (line) => {
      const current = pending;
      if (current) {
        pending = null;
        current.resolve(line);
      } else {
        queued.push(line);
      }
    });
    iface.on('SIGINT', () => {
      abortPending('Input aborted by operator');
      iface.close();
      onInterrupt();
    });
    iface.on('close', () => {
      closed = true;
      abortPending('Input stream closed before an answer was given');
    });
    rl = iface;
    return iface;
  };

  const question = (query: string): Promise<string> => {
    const iface = closed ? null : getInterface();
    if (iface) {
      iface.setPrompt(query);
      iface.prompt();
    }
    const next = queued.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (!iface || closed) {
      return Promise.reject(new InputAbortedError('Input stream is closed'));
    }
    return new Promise<string>((resolve, reject) => {
      pending = { resolve, reject };
    });
  };

  return {
    async ask(query: string): Promise<string> {
      const answer = await question(query);
      return answer.trim();
    },

    askRaw(query: string): Promise<string> {
      return question(query);
    },

    async askSecret(query: string): Promise<string> {
      output.write(query);
      muted = true;
      try {
        return await question('');
      } finally {
        unmute();
      }
    },

    close(): void {
      if (rl && !closed) {
        rl.close();
      }
      closed = true;
    },
  };
}
