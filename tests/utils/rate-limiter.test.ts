/**
 * Tests for rate limiting primitives
 */

import { describe, it, expect } from 'vitest';
import { CallBudget, RateLimiter } from '../../src/utils/rate-limiter.js';
import { TestClock } from '../helpers/fakes.js';

describe('RateLimiter', () => {
  it('queues concurrent callers one interval apart', async () => {
    // Frozen time: every caller reserves its slot from t=0
    const waits: number[] = [];
    const limiter = new RateLimiter(1000, { now: () => 0, sleep: async (ms) => void waits.push(ms) });

    await Promise.all([limiter.waitForSlot(), limiter.waitForSlot(), limiter.waitForSlot()]);

    expect(waits).toEqual([1000, 2000]);
  });

  it('does not wait once the interval has passed', async () => {
    const clock = new TestClock();
    const limiter = new RateLimiter(1000, clock);

    await limiter.waitForSlot();
    clock.time = 5000;
    await limiter.waitForSlot();

    expect(clock.sleeps).toEqual([]);
  });
});

describe('CallBudget', () => {
  it('hands out exactly its limit', () => {
    const budget = new CallBudget(2);

    expect(budget.tryAcquire()).toBe(true);
    expect(budget.tryAcquire()).toBe(true);
    expect(budget.tryAcquire()).toBe(false);
    expect(budget.consumed).toBe(2);
    expect(budget.remaining).toBe(0);
    expect(budget.exhausted).toBe(true);
  });
});
