/**
 * Rate Limiter / Backoff Controller
 *
 * Every adapter invocation goes through here: one unit of the pass budget,
 * a slot from the source type's rate limiter, a hard timeout, and the retry
 * policy around all three.
 */

import type { RateLimitConfig, SourceType } from '../types/index.js';
import { BudgetExhaustedError } from '../errors.js';
import { CallBudget, RateLimiter, type Clock } from '../utils/rate-limiter.js';
import { createRetryPolicy, sleep, withRetry, type RetryPolicy } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';

export interface FetchControllerOptions {
  rateLimits: Record<SourceType, Pick<RateLimitConfig, 'minIntervalMs'>>;
  /** Adapter invocations allowed per pass, retries included */
  callBudget: number;
  timeoutMs: number;
  retry?: RetryPolicy;
  clock?: Clock;
  random?: () => number;
}

export class FetchController {
  private readonly limiters: Record<SourceType, RateLimiter>;
  private readonly retry: RetryPolicy;
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(private readonly options: FetchControllerOptions) {
    this.clock = options.clock ?? { now: () => Date.now(), sleep };
    this.random = options.random ?? Math.random;
    this.retry = options.retry ?? createRetryPolicy();
    this.limiters = {
      rss: new RateLimiter(options.rateLimits.rss.minIntervalMs, this.clock),
      facebook: new RateLimiter(options.rateLimits.facebook.minIntervalMs, this.clock),
    };
  }

  /** Fresh budget for one pass, shared by all of its workers */
  createBudget(): CallBudget {
    return new CallBudget(this.options.callBudget);
  }

  async execute<T>(
    type: SourceType,
    budget: CallBudget,
    call: (signal: AbortSignal) => Promise<T>,
    label: string = type
  ): Promise<T> {
    const limiter = this.limiters[type];

    return withRetry(
      async () => {
        if (!budget.tryAcquire()) {
          throw new BudgetExhaustedError(budget.limit);
        }
        await limiter.waitForSlot();
        return withTimeout(call, this.options.timeoutMs, `Fetch of ${label}`);
      },
      this.retry,
      { sleep: this.clock.sleep, random: this.random }
    );
  }
}
