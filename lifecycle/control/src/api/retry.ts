// api/retry.ts - Bounded retry with exponential backoff

import { calculateBackoff } from "@riftctl/contracts";

// =============================================================================
// Types
// =============================================================================

export interface RetryOptions {
  /** Extra attempts after the first one. 0 means a single attempt. */
  retries: number;
  /** Delay before attempt `attempt + 1`; attempt is 0-based */
  backoff?: (attempt: number) => number;
  sleep?: (ms: number) => Promise<void>;
  /** Errors rejected here are rethrown at once. Defaults to retrying everything. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  /** Builds the error thrown after the last attempt fails */
  onExhausted?: (lastError: unknown, retries: number) => Error;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// =============================================================================
// Combinator
// =============================================================================

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const backoff = options.backoff ?? ((attempt: number) => calculateBackoff(attempt));
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (options.shouldRetry && !options.shouldRetry(err, attempt)) {
        throw err;
      }
      if (attempt >= options.retries) {
        throw options.onExhausted ? options.onExhausted(err, options.retries) : err;
      }
      const delayMs = backoff(attempt);
      options.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
