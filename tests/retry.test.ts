/**
 * Tests for retry utilities
 */

import { describe, it, expect, vi } from 'vitest';
import { nextDelay, parseRetryAfter, retryWithBackoff } from '../src/utils/retry.js';
import { ApiError, NetworkError, isRetryable } from '../src/core/errors.js';
import type { RetryPolicy } from '../src/core/types.js';

const policy: RetryPolicy = { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 30000 };
const instant: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 50 };

describe('nextDelay', () => {
  it('should double the delay after each failed attempt', () => {
    expect(nextDelay(1, policy)).toBe(1000);
    expect(nextDelay(2, policy)).toBe(2000);
    expect(nextDelay(3, policy)).toBe(4000);
  });

  it('should cap the delay', () => {
    expect(nextDelay(6, policy)).toBe(30000);
  });
});

describe('retryWithBackoff', () => {
  it('should retry retryable failures until the task succeeds', async () => {
    const task = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new NetworkError('reset', 'https://api.test'))
      .mockRejectedValueOnce(new ApiError('rate_limited', 'slow down', { status: 429 }))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    const result = await retryWithBackoff(task, instant, { isRetryable, onRetry });

    expect(result).toBe('ok');
    expect(task).toHaveBeenCalledTimes(3);
    expect(task).toHaveBeenLastCalledWith(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should not retry a rejected request', async () => {
    const rejected = new ApiError('rejected', 'unauthorized', { status: 401 });
    const task = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(rejected);

    await expect(retryWithBackoff(task, instant, { isRetryable })).rejects.toBe(rejected);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should rethrow the last error once attempts run out', async () => {
    const last = new ApiError('rate_limited', 'third', { status: 429 });
    const task = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ApiError('rate_limited', 'first', { status: 429 }))
      .mockRejectedValueOnce(new ApiError('rate_limited', 'second', { status: 429 }))
      .mockRejectedValueOnce(last);

    await expect(retryWithBackoff(task, instant, { isRetryable })).rejects.toBe(last);
    expect(task).toHaveBeenCalledTimes(3);
  });

  it('should wait at least the delay the failure asks for, up to the cap', async () => {
    const task = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ApiError('rate_limited', 'a', { retryAfterMs: 20 }))
      .mockRejectedValueOnce(new ApiError('rate_limited', 'b', { retryAfterMs: 60000 }))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await retryWithBackoff(task, instant, {
      isRetryable,
      delayFor: (error) => (error instanceof ApiError ? error.retryAfterMs : undefined),
      onRetry,
    });

    expect(onRetry.mock.calls.map((call) => call[2])).toEqual([20, 50]);
  });
});

describe('parseRetryAfter', () => {
  it('should read delta seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
  });

  it('should read an HTTP date relative to now', () => {
    const now = Date.UTC(2024, 0, 1, 0, 0, 0);
    expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:05 GMT', now)).toBe(5000);
  });

  it('should ignore missing or unusable values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
