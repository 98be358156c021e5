// pattern: Functional Core

export type { RateLimiter, RateLimitMode, RateLimitState, AcquireOptions } from './types.ts';
export { createTokenBucket } from './token-bucket.ts';
export type { TokenBucketOptions } from './token-bucket.ts';
