/**
 * Retry - Test Suite
 */

import { beforeAll, describe, expect, it, vi } from 'vitest';
import { AuthError, StorageError, calculateDelay, configureLogger, isRetryableError, retry } from '../src/index.js';

beforeAll(() => {
  configureLogger({ output: false });
});

describe('calculateDelay', () => {
  it('should follow the strategy and respect the cap', () => {
    expect(calculateDelay(3, 'exponential', 100, 5000)).toBe(400);
    expect(calculateDelay(3, 'linear', 100, 5000)).toBe(300);
    expect(calculateDelay(3, 'fixed', 100, 5000)).toBe(100);
    expect(calculateDelay(10, 'exponential', 100, 5000)).toBe(5000);
  });
});

describe('retry', () => {
  it('should retry retryable failures until one succeeds', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new StorageError('down'))
      .mockRejectedValueOnce(new StorageError('down'))
      .mockResolvedValue('ok');

    const outcome = await retry(fn, { maxRetries: 3, baseDelay: 1, jitter: false, isRetryable: isRetryableError });

    expect(outcome).toEqual({ result: 'ok', attempts: 3, totalDelay: 3 });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should stop at once on a failure that is not retryable', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new AuthError('denied'));

    await expect(retry(fn, { maxRetries: 3, baseDelay: 1, isRetryable: isRetryableError }))
      .rejects.toBeInstanceOf(AuthError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry only storage failures by default', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('bug'));

    await expect(retry(fn, { baseDelay: 1 })).rejects.toThrow('bug');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should rethrow the last error once retries are exhausted', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new StorageError('still down'));

    await expect(retry(fn, { maxRetries: 2, baseDelay: 1, jitter: false }))
      .rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(3);
  });
});
