// pattern: Imperative Shell

/**
 * RetryingTransport: rate-limit admission + send + classify + backoff, per attempt.
 * Non-2xx statuses become classified failures; a 2xx response is returned as-is even
 * when its payload describes a vendor error (connectors translate those).
 */

import type { RetryPolicy } from '../config/schema.ts';
import type { Logger } from '../logging/logger.ts';
import { componentLogger } from '../logging/logger.ts';
import type { RateLimiter } from '../ratelimit/types.ts';
import { withDeadline } from '../timing/clock.ts';
import type { Clock } from '../timing/clock.ts';
import { classifyFailure, classifyStatus, HttpStatusError } from './classify.ts';
import { createFetchSender } from './http.ts';
import { callWithRetry, DEFAULT_RETRY_POLICY } from './retry.ts';
import type {
  ExecuteOptions,
  HttpRequest,
  HttpSender,
  RetryingTransport,
  TransportResult,
} from './types.ts';

export type RetryingTransportOptions = {
  send?: HttpSender;
  base_url?: string;
  default_headers?: Readonly<Record<string, string>>;
  /** Per-attempt timeout. */
  timeout_ms?: number;
  policy?: RetryPolicy;
  limiter?: RateLimiter;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
};

export function createRetryingTransport(options: RetryingTransportOptions = {}): RetryingTransport {
  const log = componentLogger('transport', options.logger);
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const send = options.send ?? createFetchSender({
    base_url: options.base_url,
    default_headers: options.default_headers,
  });

  return {
    policy,

    async execute(request: HttpRequest, executeOptions: ExecuteOptions = {}): Promise<TransportResult> {
      const effective: RetryPolicy = { ...policy, ...executeOptions.policy };
      const signal = withDeadline(executeOptions.signal, executeOptions.timeout_ms);
      const operation = `${request.method} ${request.url}`;

      const outcome = await callWithRetry(
        async () => {
          const attemptSignal = withDeadline(signal, options.timeout_ms);
          const response = await send(request, attemptSignal);
          if (classifyStatus(response.status) !== undefined) {
            throw new HttpStatusError(response);
          }
          return response;
        },
        {
          policy: effective,
          classify: classifyFailure,
          idempotent: request.idempotent ?? false,
          limiter: options.limiter,
          signal,
          clock: options.clock,
          random: options.random,
          logger: options.logger,
          operation,
        },
      );

      log.debug(
        {
          operation,
          status: outcome.value.status,
          attempts: outcome.attempts,
          elapsed_ms: outcome.elapsed_ms,
        },
        'request completed',
      );

      return {
        response: outcome.value,
        attempts: outcome.attempts,
        elapsed_ms: outcome.elapsed_ms,
      };
    },
  };
}
