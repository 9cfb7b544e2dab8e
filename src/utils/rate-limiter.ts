/**
 * Rate limiting primitives for outbound calls
 */

import { sleep } from './retry.js';

export interface Clock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

const systemClock: Clock = { now: () => Date.now(), sleep };

/**
 * Enforces a minimum interval between call starts.
 *
 * Slots are reserved synchronously, so concurrent callers queue up behind each
 * other instead of all waking at the same instant.
 */
export class RateLimiter {
  private nextSlotAt = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  async waitForSlot(): Promise<void> {
    const now = this.clock.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;

    const waitTime = slot - now;
    if (waitTime > 0) {
      await this.clock.sleep(waitTime);
    }
  }
}

/**
 * Per-pass call budget shared by every worker of the pass
 */
export class CallBudget {
  private used = 0;

  constructor(readonly limit: number) {}

  /** Reserve one call; false once the budget is spent */
  tryAcquire(): boolean {
    if (this.used >= this.limit) {
      return false;
    }
    this.used++;
    return true;
  }

  get consumed(): number {
    return this.used;
  }

  get exhausted(): boolean {
    return this.used >= this.limit;
  }
}
