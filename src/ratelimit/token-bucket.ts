// pattern: Imperative Shell

/**
 * Token-bucket RateLimiter.
 * Refill is computed lazily from elapsed time on every check; there is no ticking timer.
 * Each check-and-decrement runs synchronously, so concurrent callers on the event
 * loop always observe a consistent token count.
 */

import { OperationCancelledError, RateLimitExceededError, RateLimitTimeoutError } from '../errors/index.ts';
import type { RateLimitConfig } from '../config/schema.ts';
import type { Logger } from '../logging/logger.ts';
import { componentLogger } from '../logging/logger.ts';
import { abortReason, systemClock } from '../timing/clock.ts';
import type { Clock } from '../timing/clock.ts';
import type { AcquireOptions, RateLimiter, RateLimitState } from './types.ts';

// Guards against 0.9999999 tokens after a refill that should have produced exactly 1.
const EPSILON = 1e-9;

export type TokenBucketOptions = RateLimitConfig & {
  clock?: Clock;
  logger?: Logger;
};

export function createTokenBucket(options: TokenBucketOptions): RateLimiter {
  const clock = options.clock ?? systemClock;
  const log = componentLogger('ratelimit', options.logger);
  const { capacity, refill_per_second, mode } = options;

  let tokens = capacity;
  let lastRefill = clock.now();
  const waiters: Array<symbol> = [];

  function refill(): void {
    const now = clock.now();
    const elapsedSeconds = Math.max(0, now - lastRefill) / 1000;
    tokens = Math.min(capacity, tokens + elapsedSeconds * refill_per_second);
    lastRefill = now;
  }

  function take(cost: number): boolean {
    refill();
    if (tokens + EPSILON >= cost) {
      tokens = Math.max(0, tokens - cost);
      return true;
    }
    return false;
  }

  function msUntil(cost: number): number {
    const missing = Math.max(0, cost - tokens);
    return Math.max(1, Math.ceil((missing / refill_per_second) * 1000));
  }

  function checkCost(cost: number): void {
    if (!Number.isFinite(cost) || cost <= 0) {
      throw new RangeError(`rate limit cost must be a positive number, got ${cost}`);
    }
    if (cost > capacity) {
      refill();
      throw new RateLimitExceededError(cost, tokens);
    }
  }

  async function waitForTokens(cost: number, acquireOptions: AcquireOptions): Promise<void> {
    const ticket = Symbol('waiter');
    const startedAt = clock.now();
    const timeout = acquireOptions.timeout_ms ?? options.max_wait_ms;
    const signal = acquireOptions.signal;
    waiters.push(ticket);

    try {
      for (;;) {
        if (signal?.aborted) {
          throw abortReason(signal);
        }
        if (waiters[0] === ticket && take(cost)) {
          return;
        }

        const waited = clock.now() - startedAt;
        const remaining = timeout - waited;
        if (remaining <= 0) {
          log.warn({ cost, waited_ms: waited }, 'rate limit wait timed out');
          throw new RateLimitTimeoutError(waited);
        }

        const delay = Math.min(options.poll_interval_ms, msUntil(cost), remaining);
        await clock.sleep(delay, signal);
      }
    } catch (error) {
      if (error instanceof OperationCancelledError || error instanceof RateLimitTimeoutError) {
        throw error;
      }
      throw new OperationCancelledError('rate limit wait interrupted', { cause: error });
    } finally {
      const index = waiters.indexOf(ticket);
      if (index >= 0) {
        waiters.splice(index, 1);
      }
    }
  }

  return {
    mode,

    tryAcquire(cost = 1): boolean {
      checkCost(cost);
      if (waiters.length > 0) {
        return false;
      }
      return take(cost);
    },

    async acquire(cost = 1, acquireOptions: AcquireOptions = {}): Promise<void> {
      checkCost(cost);

      if (waiters.length === 0 && take(cost)) {
        return;
      }

      if (mode === 'fail_fast') {
        throw new RateLimitExceededError(cost, tokens);
      }

      log.debug({ cost, tokens, waiting: waiters.length }, 'waiting for rate limit admission');
      await waitForTokens(cost, acquireOptions);
    },

    snapshot(): RateLimitState {
      refill();
      return {
        capacity,
        refill_per_second,
        tokens,
        last_refill: lastRefill,
        waiting: waiters.length,
      };
    },
  };
}
