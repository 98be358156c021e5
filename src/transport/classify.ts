// pattern: Functional Core

/**
 * Failure classification.
 * Maps whatever an attempt threw onto a FailureKind; `undefined` means "not a
 * transport failure" and the error propagates untouched.
 */

import {
  OperationCancelledError,
  RateLimitExceededError,
  RateLimitTimeoutError,
} from '../errors/index.ts';
import type { FailureKind } from '../errors/index.ts';
import type { FailureClassification, HttpResponse } from './types.ts';

/**
 * Failures that provably happened before the server saw the request.
 * These may be retried even for non-idempotent operations.
 */
export const PRE_EXECUTION_FAILURES: ReadonlySet<FailureKind> = new Set<FailureKind>([
  'connection',
  'rate_limited',
]);

const NEVER_RETRIED: ReadonlySet<FailureKind> = new Set<FailureKind>(['client', 'cancelled']);

export class HttpStatusError extends Error {
  constructor(public readonly response: HttpResponse) {
    super(`HTTP ${response.status}`);
    this.name = 'HttpStatusError';
  }
}

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
]);

const NETWORK_CODES = new Set(['ECONNRESET', 'EPIPE', 'UND_ERR_SOCKET', 'UND_ERR_CLOSED']);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error && error.cause !== error) {
    return errorCode(error.cause);
  }
  return undefined;
}

export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

export function classifyStatus(status: number): FailureKind | undefined {
  if (status >= 200 && status < 400) {
    return undefined;
  }
  if (status === 429) {
    return 'rate_limited';
  }
  if (status === 503) {
    return 'unavailable';
  }
  if (status === 408 || status === 504) {
    return 'timeout';
  }
  if (status >= 500) {
    return 'server';
  }
  return 'client';
}

export function classifyFailure(error: unknown): FailureClassification | undefined {
  if (error instanceof HttpStatusError) {
    const kind = classifyStatus(error.response.status) ?? 'client';
    return {
      kind,
      status: error.response.status,
      retry_after_ms: parseRetryAfter(error.response.headers['retry-after']),
    };
  }

  if (error instanceof RateLimitExceededError || error instanceof RateLimitTimeoutError) {
    return { kind: 'rate_limited' };
  }

  if (error instanceof OperationCancelledError) {
    return { kind: 'cancelled' };
  }

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return { kind: error.name === 'TimeoutError' ? 'timeout' : 'cancelled' };
  }

  const code = errorCode(error);
  if (code !== undefined) {
    if (CONNECTION_CODES.has(code)) return { kind: 'connection' };
    if (NETWORK_CODES.has(code)) return { kind: 'network' };
    if (TIMEOUT_CODES.has(code)) return { kind: 'timeout' };
  }

  // undici reports every socket-level failure as `TypeError: fetch failed`
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return { kind: 'network' };
  }

  return undefined;
}

export function isRetryable(
  kind: FailureKind,
  retryOn: ReadonlyArray<FailureKind>,
  idempotent: boolean,
): boolean {
  if (NEVER_RETRIED.has(kind) || !retryOn.includes(kind)) {
    return false;
  }
  return idempotent || PRE_EXECUTION_FAILURES.has(kind);
}
