// pattern: Functional Core

/**
 * Connector types.
 * A connector is the per-vendor façade: one credential resolver, one token bucket and
 * one retrying transport, plus the typed operations it declares for tool generation.
 */

import type { ConnectorConfig } from '../config/schema.ts';
import type { Credential, CredentialResolver, CredentialStatus } from '../credentials/types.ts';
import type { Logger } from '../logging/logger.ts';
import type { RateLimiter, RateLimitState } from '../ratelimit/types.ts';
import type { ExecuteOptions, HttpRequest, HttpResponse, RetryingTransport } from '../transport/types.ts';

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array';

export type OperationParameter = {
  name: string;
  type: ParameterType;
  description?: string;
  required: boolean;
  default?: unknown;
  enum_values?: ReadonlyArray<string | number>;
  minimum?: number;
  maximum?: number;
  /** Element type for `array` parameters. */
  items?: ParameterType;
};

export type OperationContext = {
  connector: Connector;
  invocation_id: string;
  signal?: AbortSignal;
  logger: Logger;
};

export type OperationHandler = (
  args: Record<string, unknown>,
  context: OperationContext,
) => Promise<unknown>;

export type OperationDefinition = {
  name: string;
  description: string;
  category?: string;
  parameters?: ReadonlyArray<OperationParameter>;
  /** Safe to repeat when a failure leaves the server-side effect unknown. */
  idempotent?: boolean;
  /** May run concurrently with other independent calls in the same model turn. */
  independent?: boolean;
  handler: OperationHandler;
};

export type Operation = {
  readonly connector: string;
  readonly name: string;
  readonly description: string;
  readonly category: string;
  readonly parameters: ReadonlyArray<OperationParameter>;
  readonly idempotent: boolean;
  readonly independent: boolean;
  readonly handler: OperationHandler;
};

export type ConnectorInfo = {
  name: string;
  base_url: string | undefined;
  credentials: Array<CredentialStatus>;
  operations: Array<{ name: string; category: string; idempotent: boolean }>;
  rate_limit: RateLimitState;
};

export interface Connector {
  readonly name: string;
  readonly config: ConnectorConfig;
  readonly credentials: CredentialResolver;
  readonly limiter: RateLimiter;
  readonly transport: RetryingTransport;
  credential(name: string): Promise<Credential>;
  /** Authenticated request through the connector's limiter and retry policy. */
  request(request: HttpRequest, options?: ExecuteOptions): Promise<HttpResponse>;
  defineOperation(definition: OperationDefinition): Operation;
  operations(): ReadonlyArray<Operation>;
  describe(): ConnectorInfo;
}
