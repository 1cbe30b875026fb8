// packages/core/src/utils/retry.ts

import { sleep } from './sleep.js';

export interface RetryOptions {
  attempts: number;
  backoff: number;
  /** Upper bound for a single delay. */
  maxBackoff?: number;
  /** Called before sleeping ahead of the next attempt. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const defaultOptions: RetryOptions = {
  attempts: 3,
  backoff: 1000,
};

/** Delay before attempt `attempt + 1`: exponential, optionally capped. */
export function backoffDelay(attempt: number, backoff: number, maxBackoff?: number): number {
  const delay = backoff * 2 ** (attempt - 1);
  return maxBackoff === undefined ? delay : Math.min(delay, maxBackoff);
}

/**
 * Retry an async function with exponential backoff.
 * Returns the result on success, throws the last error after all attempts exhausted.
 * The function receives the 1-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt < opts.attempts) {
        const delay = backoffDelay(attempt, opts.backoff, opts.maxBackoff);
        opts.onRetry?.(error, attempt, delay);
        if (delay > 0) await sleep(delay);
      }
    }
  }

  throw lastError;
}
