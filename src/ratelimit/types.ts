// pattern: Functional Core

/**
 * Admission control types. A RateLimiter belongs to exactly one connector instance.
 */

export type RateLimitMode = 'fail_fast' | 'blocking';

export type RateLimitState = {
  readonly capacity: number;
  readonly refill_per_second: number;
  readonly tokens: number;
  readonly last_refill: number;
  readonly waiting: number;
};

export type AcquireOptions = {
  timeout_ms?: number;
  signal?: AbortSignal;
};

export interface RateLimiter {
  readonly mode: RateLimitMode;
  acquire(cost?: number, options?: AcquireOptions): Promise<void>;
  tryAcquire(cost?: number): boolean;
  snapshot(): RateLimitState;
}
