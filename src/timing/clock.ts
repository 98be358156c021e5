// pattern: Imperative Shell

import { OperationCancelledError } from '../errors/index.ts';

/**
 * Time source for everything that waits: rate-limit admission and retry backoff.
 * Injected so tests can advance time without real timers.
 */
export type Clock = {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
};

export function abortReason(signal: AbortSignal): OperationCancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof OperationCancelledError) {
    return reason;
  }
  if (reason instanceof Error && reason.name === 'TimeoutError') {
    return new OperationCancelledError('operation deadline exceeded', { cause: reason });
  }
  return new OperationCancelledError('operation cancelled', { cause: reason });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new OperationCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Combine an optional caller signal with an optional deadline.
 */
export function withDeadline(signal: AbortSignal | undefined, timeout_ms: number | undefined): AbortSignal | undefined {
  if (timeout_ms === undefined) {
    return signal;
  }
  const deadline = AbortSignal.timeout(timeout_ms);
  return signal ? AbortSignal.any([signal, deadline]) : deadline;
}
