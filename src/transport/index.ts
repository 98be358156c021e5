// pattern: Functional Core

export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpSender,
  QueryValue,
  FailureClassification,
  ExecuteOptions,
  TransportResult,
  RetryingTransport,
} from './types.ts';

export {
  classifyFailure,
  classifyStatus,
  isRetryable,
  parseRetryAfter,
  HttpStatusError,
  PRE_EXECUTION_FAILURES,
} from './classify.ts';
export { callWithRetry, computeBackoff, DEFAULT_RETRY_POLICY } from './retry.ts';
export type { RetryOptions, RetryOutcome } from './retry.ts';
export { createFetchSender, buildUrl } from './http.ts';
export { createRetryingTransport } from './retrying-transport.ts';
export type { RetryingTransportOptions } from './retrying-transport.ts';
