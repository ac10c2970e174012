/**
 * Retry Logic with Backoff
 *
 * Drives the whole-attempt retry loop of a scrape session.
 */

import { logger } from './logger.js';

const log = logger.retry;

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   * - maxAttempts: 1 = no retries (just the initial attempt)
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   *
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Delay before the attempt that follows `attempt` (1-based).
   * @default 900 * attempt
   */
  delayForAttempt?: (attempt: number) => number;

  /**
   * Called before each retry; logs through the retry logger when omitted.
   */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  delayForAttempt: (attempt) => 900 * attempt,
  onRetry: (attempt, error, delayMs) => {
    log.warn('Retry attempt failed', { attempt, error: error.message, retryDelayMs: delayMs });
  },
};

/**
 * Execute an async function with automatic retry on failure.
 *
 * The function receives the 1-based attempt number.
 *
 * @throws Last error if all attempts fail
 *
 * @example
 * ```typescript
 * const offers = await withRetry(
 *   (attempt) => runAttempt(attempt),
 *   { maxAttempts: 3, delayForAttempt: (n) => 900 * n }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxAttempts) {
        throw lastError;
      }

      const delay = opts.delayForAttempt(attempt);
      opts.onRetry(attempt, lastError, delay);
      await sleep(delay);
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
