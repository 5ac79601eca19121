import * as readline from 'readline/promises';
import { setTimeout as sleep } from 'timers/promises';

/**
 * Decides what happens after a failed table write
 */
export interface RetryPolicy {
  /**
   * @param error - Failure of the last attempt
   * @param attempt - 1-based number of the attempt that failed
   * @param targetPath - File being written
   * @returns true to write again, false to give up
   */
  shouldRetry(error: unknown, attempt: number, targetPath: string): Promise<boolean>;
}

export interface PromptRetryOptions {
  /** Shows the message and resolves once the operator acknowledges it */
  ask?: (message: string) => Promise<void>;
  /** Streams for the default terminal prompt */
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class RetryAbortedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RetryAbortedError';
  }
}

/**
 * Wait for Enter. Rejects if the input ends before an answer arrives.
 */
async function askOnTerminal(
  message: string,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Promise<void> {
  const rl = readline.createInterface({ input, output });
  let rejectClosed: (error: Error) => void = () => undefined;
  const closed = new Promise<never>((_resolve, reject) => {
    rejectClosed = reject;
  });
  const onClose = () =>
    rejectClosed(new RetryAbortedError('Input closed before the retry was acknowledged.'));
  rl.once('close', onClose);

  try {
    await Promise.race([rl.question(message), closed]);
  } finally {
    rl.off('close', onClose);
    rl.close();
  }
}

/**
 * Interactive policy: never gives up while someone can answer. Each failure
 * waits for the operator, typically to close the spreadsheet that holds the
 * file open.
 */
export function createPromptRetryPolicy(options: PromptRetryOptions = {}): RetryPolicy {
  const ask =
    options.ask ??
    ((message: string) =>
      askOnTerminal(message, options.input ?? process.stdin, options.output ?? process.stdout));
  return {
    async shouldRetry(_error, _attempt, targetPath) {
      await ask(
        `Could not open ${targetPath}! Close any application holding it open, then press Enter to retry. `
      );
      return true;
    },
  };
}

export interface BackoffRetryOptions {
  delayMs: number;
  maxAttempts: number;
}

export const DEFAULT_BACKOFF: BackoffRetryOptions = {
  delayMs: 1000,
  maxAttempts: 5,
};

/**
 * Non-interactive policy for unattended runs: fixed delay, bounded attempts
 */
export function createBackoffRetryPolicy(
  options: BackoffRetryOptions = DEFAULT_BACKOFF
): RetryPolicy {
  return {
    async shouldRetry(_error, attempt) {
      if (attempt >= options.maxAttempts) {
        return false;
      }
      await sleep(options.delayMs);
      return true;
    },
  };
}
