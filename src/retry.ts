/**
 * Bounded retry with exponential backoff
 */

import { sleep } from './utils';

export interface RetryOptions {
  /** Extra attempts after the first one */
  retries: number;
  baseDelayMs: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt - 1)
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * the retry budget is spent. The last error is rethrown unchanged.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;

  while (true) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= options.retries || !options.shouldRetry(error)) {
        throw error;
      }
      attempt++;
      const delayMs = backoffDelay(options.baseDelayMs, attempt);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
