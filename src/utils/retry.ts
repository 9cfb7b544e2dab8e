/**
 * Exponential backoff retry utility
 */

import type { RetryConfig } from '../types/index.js';
import { isTransientFetchError } from '../errors.js';
import { logger } from './logger.js';

export interface RetryPolicy extends RetryConfig {
  /** Only errors matching this predicate are retried */
  isRetryable: (error: unknown) => boolean;
}

export interface RetryHooks {
  /** Called before each attempt, 1-based */
  onAttempt?: (attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 250,
};

export function createRetryPolicy(config: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    ...DEFAULT_RETRY_CONFIG,
    isRetryable: isTransientFetchError,
    ...config,
  };
}

/**
 * Delay before the retry that follows `attempt` (1-based): base * 2^(attempt-1), capped, plus jitter
 */
export function backoffDelay(
  policy: RetryConfig,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  return capped + Math.floor(random() * policy.jitterMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = createRetryPolicy(),
  hooks: RetryHooks = {}
): Promise<T> {
  const { onAttempt, sleep: wait = sleep, random = Math.random } = hooks;

  for (let attempt = 1; ; attempt++) {
    onAttempt?.(attempt);

    try {
      return await fn(attempt);
    } catch (error) {
      if (!policy.isRetryable(error)) {
        throw error;
      }

      if (attempt >= policy.maxAttempts) {
        logger.warn(
          { error: errorMessage(error), attempt, maxAttempts: policy.maxAttempts },
          'All retry attempts exhausted'
        );
        throw error;
      }

      const delay = backoffDelay(policy, attempt, random);
      logger.debug(
        { error: errorMessage(error), attempt, maxAttempts: policy.maxAttempts, nextDelayMs: delay },
        'Retry attempt failed, waiting before next attempt'
      );

      await wait(delay);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export { sleep };
