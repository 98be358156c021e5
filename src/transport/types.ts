// pattern: Functional Core

/**
 * Transport types: the generic request/response envelope every connector speaks.
 * Vendor payload shapes are opaque here; connectors interpret `data`.
 */

import type { FailureKind } from '../errors/index.ts';
import type { RetryPolicy } from '../config/schema.ts';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'LIST';

export type QueryValue = string | number | boolean | undefined;

export type HttpRequest = {
  method: HttpMethod;
  /** Absolute URL, or a path joined onto the transport's base URL. */
  url: string;
  query?: Readonly<Record<string, QueryValue>>;
  headers?: Readonly<Record<string, string>>;
  /** Serialized as JSON unless it is already a string. */
  body?: unknown;
  /**
   * Whether repeating the request is safe when its outcome is unknown.
   * Never inferred from the method; operations declare it.
   */
  idempotent?: boolean;
};

export type HttpResponse = {
  status: number;
  headers: Readonly<Record<string, string>>;
  text: string;
  /** Parsed JSON body, when the body is JSON. */
  data: unknown;
};

export type HttpSender = (request: HttpRequest, signal?: AbortSignal) => Promise<HttpResponse>;

export type FailureClassification = {
  kind: FailureKind;
  status?: number;
  retry_after_ms?: number;
};

export type ExecuteOptions = {
  policy?: Partial<RetryPolicy>;
  signal?: AbortSignal;
  /** Overall deadline across every attempt and backoff sleep. */
  timeout_ms?: number;
};

export type TransportResult = {
  response: HttpResponse;
  attempts: number;
  elapsed_ms: number;
};

export interface RetryingTransport {
  readonly policy: RetryPolicy;
  execute(request: HttpRequest, options?: ExecuteOptions): Promise<TransportResult>;
}
