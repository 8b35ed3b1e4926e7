/**
 * Retry and backoff utilities
 */

import type { RetryPolicy } from '../core/types.js';

export interface RetryHooks {
  /** Decides whether a failure is worth another attempt */
  isRetryable: (error: unknown) => boolean;
  /** Minimum wait requested by the failure itself, e.g. a Retry-After header */
  delayFor?: (error: unknown) => number | undefined;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Delay before the next attempt, after `attempt` attempts have failed
 * @param attempt 1-based number of the attempt that just failed
 */
export function nextDelay(attempt: number, policy: RetryPolicy): number {
  const delay = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Retry a task with exponential backoff
 * @param task Task to run; receives the 1-based attempt number
 * @returns Task result
 */
export async function retryWithBackoff<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !hooks.isRetryable(error)) {
        throw error;
      }

      const requested = hooks.delayFor?.(error) ?? 0;
      const delay = Math.min(Math.max(nextDelay(attempt, policy), requested), policy.maxDelayMs);
      hooks.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}

/**
 * Sleep for specified milliseconds
 * @param ms Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Parse a Retry-After header value (delta seconds or HTTP date)
 * @returns Milliseconds to wait, or undefined when the value is unusable
 */
export function parseRetryAfter(value: string | undefined, now = Date.now()): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}
