/**
 * Bounded waiting and bounded retries.
 *
 * No storage or database call may hang a request: each one is raced against
 * a timer, and recoverable failures are retried a fixed number of times.
 */

import { AppError } from './errors.utils';

/**
 * Reject with `onTimeout()` if `promise` has not settled after `ms` milliseconds.
 * A non-positive `ms` disables the timer.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  if (ms <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  retries: number;
  delayMs?: number;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Run `fn`, retrying only errors flagged `recoverable` (storage I/O, persistence timeouts)
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { retries, delayMs = 50, onRetry } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const recoverable = error instanceof AppError && error.recoverable;
      if (!recoverable || attempt >= retries) {
        throw error;
      }
      onRetry?.(error, attempt + 1);
      await new Promise((resolve) => setTimeout(resolve, delayMs * (attempt + 1)));
    }
  }
}
