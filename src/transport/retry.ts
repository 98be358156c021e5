// pattern: Imperative Shell

/**
 * Retry logic shared by the HTTP transport and every model adapter.
 * Callers supply a classifier; the policy decides which kinds are retried and how
 * long to back off between attempts.
 */

import { OperationCancelledError, TransportError } from '../errors/index.ts';
import type { FailureKind } from '../errors/index.ts';
import type { RetryPolicy } from '../config/schema.ts';
import type { Logger } from '../logging/logger.ts';
import { componentLogger } from '../logging/logger.ts';
import type { RateLimiter } from '../ratelimit/types.ts';
import { abortReason, systemClock } from '../timing/clock.ts';
import type { Clock } from '../timing/clock.ts';
import { isRetryable } from './classify.ts';
import type { FailureClassification } from './types.ts';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  max_attempts: 3,
  base_delay_ms: 1000,
  multiplier: 2,
  max_delay_ms: 30000,
  jitter: 0.1,
  retry_on: ['connection', 'network', 'timeout', 'rate_limited', 'unavailable', 'server'],
};

export type RetryOptions = {
  policy: RetryPolicy;
  classify: (error: unknown) => FailureClassification | undefined;
  idempotent: boolean;
  limiter?: RateLimiter;
  signal?: AbortSignal;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
  /** Label for log lines and error messages, e.g. `GET /v1/secret/data/app`. */
  operation?: string;
  onError?: (error: unknown, attempt: number) => void;
};

export type RetryOutcome<T> = {
  value: T;
  attempts: number;
  elapsed_ms: number;
};

/**
 * `min(max_delay, base * multiplier^(attempt-1))`, scaled by a factor drawn from
 * `[1 - jitter, 1 + jitter]`, capped at `max_delay` again.
 */
export function computeBackoff(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.base_delay_ms * Math.pow(policy.multiplier, attempt - 1);
  const capped = Math.min(policy.max_delay_ms, exponential);
  const factor = 1 + (random() * 2 - 1) * policy.jitter;
  return Math.max(0, Math.min(policy.max_delay_ms, Math.round(capped * factor)));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function callWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const clock = options.clock ?? systemClock;
  const random = options.random ?? Math.random;
  const log = componentLogger('retry', options.logger);
  const { policy, signal } = options;
  const label = options.operation ?? 'request';
  const startedAt = clock.now();
  const elapsed = (): number => clock.now() - startedAt;

  function cancelled(attempts: number, cause: unknown): TransportError {
    return new TransportError('cancelled', `${label} cancelled`, attempts, elapsed(), undefined, { cause });
  }

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw cancelled(attempt - 1, abortReason(signal));
    }

    try {
      if (options.limiter) {
        await options.limiter.acquire(1, { signal });
      }
      const value = await fn(attempt);
      return { value, attempts: attempt, elapsed_ms: elapsed() };
    } catch (error) {
      if (options.onError) {
        options.onError(error, attempt);
      }

      if (signal?.aborted || error instanceof OperationCancelledError) {
        throw cancelled(attempt, signal?.aborted ? abortReason(signal) : error);
      }

      const classification = options.classify(error);
      if (!classification) {
        throw error;
      }

      const kind: FailureKind = classification.kind;
      const retryable = isRetryable(kind, policy.retry_on, options.idempotent);
      const exhausted = attempt >= policy.max_attempts;

      log.warn(
        {
          operation: label,
          attempt,
          max_attempts: policy.max_attempts,
          failure: kind,
          status: classification.status,
          retryable,
          error: describe(error),
        },
        'attempt failed',
      );

      if (!retryable || exhausted) {
        throw new TransportError(
          kind,
          `${label} failed: ${describe(error)}`,
          attempt,
          elapsed(),
          classification.status,
          { cause: error },
        );
      }

      const backoff = computeBackoff(attempt, policy, random);
      const delay = classification.retry_after_ms !== undefined
        ? Math.min(policy.max_delay_ms, Math.max(backoff, classification.retry_after_ms))
        : backoff;

      log.debug({ operation: label, attempt, delay_ms: delay }, 'backing off before retry');

      try {
        await clock.sleep(delay, signal);
      } catch (sleepError) {
        throw cancelled(attempt, sleepError);
      }
    }
  }
}
