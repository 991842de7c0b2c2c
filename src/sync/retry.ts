/**
 * corpus-sync - Per-item Retry
 *
 * Off by default (`retries = 0`). Only transient and embedding failures are
 * retried, waiting 2^attempt × baseDelayMs between attempts.
 */

import { isRetryable } from '../core/errors.js';

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return Math.pow(2, attempt) * baseDelayMs;
}

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= options.retries || !isRetryable(error) || options.signal?.aborted) {
        throw error;
      }
      const delay = backoffDelay(attempt + 1, options.baseDelayMs);
      options.onRetry?.(attempt + 1, error, delay);
      await sleep(delay);
    }
  }
}
