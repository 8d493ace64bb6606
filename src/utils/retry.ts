/**
 * Bounded exponential backoff for infrastructure calls (policy source reads,
 * ledger storage). Authorization outcomes are never passed through here.
 *
 * @module utils/retry
 */

export interface RetryOptions {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  isRetryable?: (error: unknown) => boolean;
  /** Called before each backoff sleep. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetryable = options.isRetryable ?? (() => true);
  const wait = options.sleep ?? sleep;
  let lastError: unknown;
  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt >= options.maxRetries || !isRetryable(error)) {
        throw error;
      }
      const delay = options.baseDelayMs * Math.pow(2, attempt);
      options.onRetry?.(error, attempt + 1, delay);
      await wait(delay);
    }
  }
  throw lastError;
}
