/**
 * Retry utilities with exponential backoff
 */

import { sleep } from './sleep';

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Exponential backoff: `baseDelayMs * 2^attempt`, capped at `maxDelayMs`.
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
}

export type ErrorClass = new (...args: never[]) => Error;

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  retryableErrors?: ErrorClass[];
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Execute an operation, retrying up to `maxRetries` more times on a retryable error.
 * @throws The last error if all retries are exhausted
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, baseDelay = 1000, maxDelay = 10000, retryableErrors = [], onRetry } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const isRetryable =
        retryableErrors.length === 0 ||
        retryableErrors.some((ErrorType) => error instanceof ErrorType);

      if (!isRetryable || attempt >= maxRetries) {
        throw error;
      }

      onRetry?.(error, attempt + 1);

      const delay = computeBackoffDelay(attempt, { baseDelayMs: baseDelay, maxDelayMs: maxDelay });
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}
