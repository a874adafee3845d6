/**
 * Reusable retry policy for Result-returning network operations.
 */

import { isRetryableError, type AppError } from '@/common/types/errors.js';

import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

/** Delay in milliseconds before the next attempt, given the 1-based attempt that just failed. */
export type BackoffFn = (attempt: number) => number;

export interface RetryPolicyOptions {
  /** Total attempts including the first. Default: 3 */
  maxAttempts?: number;
  /** Default: linearBackoff(1000) */
  backoff?: BackoffFn;
  /** Default: errors flagged `retryable: true` */
  isRetryable?: (error: AppError) => boolean;
  /** Injected for tests. Default: setTimeout-based sleep */
  sleep?: (ms: number) => Promise<void>;
  logger: Logger;
}

export interface RetryPolicy {
  readonly maxAttempts: number;
  /**
   * Runs the operation until it succeeds, fails with a non-retryable error,
   * or runs out of attempts. The last error is returned as-is.
   */
  execute<T, E extends AppError>(
    label: string,
    operation: () => Promise<Result<T, E>>
  ): Promise<Result<T, E>>;
}

/**
 * delayMs × attempt
 */
export const linearBackoff =
  (delayMs: number): BackoffFn =>
  (attempt) =>
    delayMs * attempt;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const createRetryPolicy = (options: RetryPolicyOptions): RetryPolicy => {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const backoff = options.backoff ?? linearBackoff(1000);
  const isRetryable = options.isRetryable ?? isRetryableError;
  const sleep = options.sleep ?? defaultSleep;
  const { logger } = options;

  return {
    maxAttempts,

    async execute<T, E extends AppError>(
      label: string,
      operation: () => Promise<Result<T, E>>
    ): Promise<Result<T, E>> {
      let attempt = 1;

      for (;;) {
        const result = await operation();
        if (result.isOk()) return result;

        const error = result.error;
        if (!isRetryable(error)) return result;

        logger.warn(
          { operation: label, attempt, maxAttempts, errorType: error.type },
          `Attempt ${String(attempt)} failed: ${error.message}`
        );

        if (attempt >= maxAttempts) return result;

        await sleep(backoff(attempt));
        attempt++;
      }
    },
  };
};

/**
 * Policy that runs the operation exactly once.
 */
export const createNoRetryPolicy = (logger: Logger): RetryPolicy =>
  createRetryPolicy({ maxAttempts: 1, logger });
