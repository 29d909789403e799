/**
 * Retry with Configurable Backoff
 *
 * Re-runs an operation that failed with a transient error. Only failures the
 * `isRetryable` predicate accepts are retried; by default that is
 * StorageError, so a NotFound or Auth failure surfaces on the first attempt.
 *
 * @example
 * ```typescript
 * const { result } = await retry(
 *   () => repository.findById(id),
 *   { ...STORAGE_READ_RETRY, name: 'users.findById' }
 * );
 * ```
 */

import { logger } from '../logger.js';
import { getErrorMessage, isRetryableError } from '../errors.js';

export type RetryStrategy = 'exponential' | 'linear' | 'fixed';

export interface RetryConfig {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Backoff strategy (default: 'exponential') */
  strategy?: RetryStrategy;
  /** Base delay in milliseconds (default: 100) */
  baseDelay?: number;
  /** Upper bound for one delay in milliseconds (default: 5000) */
  maxDelay?: number;
  /** Randomise each delay between 0 and its computed value (default: true) */
  jitter?: boolean;
  /** Operation name for log entries (default: 'retry') */
  name?: string;
  /** Which failures may be retried (default: isRetryableError) */
  isRetryable?: (error: unknown) => boolean;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
  totalDelay: number;
}

/** Short, bounded retry for idempotent storage reads on a request path */
export const STORAGE_READ_RETRY: Readonly<RetryConfig> = {
  maxRetries: 2,
  strategy: 'exponential',
  baseDelay: 50,
  maxDelay: 500,
  jitter: true,
};

/**
 * Delay before retry number `attempt` (1-based)
 */
export function calculateDelay(
  attempt: number,
  strategy: RetryStrategy,
  baseDelay: number,
  maxDelay: number
): number {
  const delay = strategy === 'linear'
    ? baseDelay * attempt
    : strategy === 'fixed'
      ? baseDelay
      : baseDelay * 2 ** (attempt - 1);

  return Math.min(delay, maxDelay);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function retry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = {}
): Promise<RetryResult<T>> {
  const {
    maxRetries = 3,
    strategy = 'exponential',
    baseDelay = 100,
    maxDelay = 5000,
    jitter = true,
    name = 'retry',
    isRetryable = isRetryableError,
  } = config;

  let totalDelay = 0;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await fn();
      if (attempt > 1) {
        logger.info(`${name}: succeeded after ${attempt - 1} retry(ies)`, { attempts: attempt, totalDelay });
      }
      return { result, attempts: attempt, totalDelay };
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt > maxRetries) {
        logger.error(`${name}: all retries exhausted`, { maxRetries, totalDelay, error: getErrorMessage(error) });
        throw error;
      }

      const computed = calculateDelay(attempt, strategy, baseDelay, maxDelay);
      const delay = jitter ? Math.floor(Math.random() * computed) : computed;
      totalDelay += delay;
      logger.debug(`${name}: retrying in ${delay}ms`, { attempt, maxRetries, error: getErrorMessage(error) });
      await sleep(delay);
    }
  }
}
