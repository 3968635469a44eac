/**
 * Retry With Backoff
 *
 * Single retry loop used by every service that talks to the exchange.
 * Delay before attempt n+1 is baseDelayMs * factor^(n-1).
 */

import { isRetryableError } from '../errors.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  /** Defaults to isRetryableError */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, baseDelayMs: number, factor: number): number {
  return baseDelayMs * Math.pow(factor, attempt - 1);
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const isRetryable = options.isRetryable ?? isRetryableError;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  let lastError: unknown = new Error('Operation was not attempted');
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = error;
      if (attempt === maxAttempts || !isRetryable(error)) {
        return { ok: false, error, attempts: attempt };
      }

      const delayMs = backoffDelay(attempt, options.baseDelayMs, options.factor);
      options.onRetry?.(attempt, error, delayMs);
      if (delayMs > 0) {
        await wait(delayMs);
      }
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}
