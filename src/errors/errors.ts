// pattern: Functional Core

/**
 * Error taxonomy shared by every layer of the connector runtime.
 * Each error carries a stable `kind` so callers (and the model, via tool results)
 * can branch on classification instead of message text.
 */

export type ErrorKind =
  | 'credential_not_found'
  | 'rate_limit_exceeded'
  | 'rate_limit_timeout'
  | 'cancelled'
  | 'transport_error'
  | 'tool_argument_error'
  | 'unknown_tool'
  | 'duplicate_tool_name'
  | 'tool_loop_budget_exceeded'
  | 'tool_loop_fatal'
  | 'vendor_api_error'
  | 'config_error'
  | 'model_error'
  | 'internal';

export type ErrorPayload = {
  kind: string;
  message: string;
};

export class ConnectorError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly fatal: boolean = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConnectorError';
  }

  toJSON(): ErrorPayload {
    return { kind: this.kind, message: this.message };
  }
}

export class CredentialNotFoundError extends ConnectorError {
  constructor(
    public readonly credential: string,
    public readonly consulted: ReadonlyArray<string> = [],
  ) {
    const tried = consulted.length > 0 ? ` (tried: ${consulted.join(', ')})` : '';
    super('credential_not_found', `credential not found: ${credential}${tried}`, true);
    this.name = 'CredentialNotFoundError';
  }
}

export class RateLimitExceededError extends ConnectorError {
  constructor(
    public readonly cost: number,
    public readonly available: number,
  ) {
    super(
      'rate_limit_exceeded',
      `rate limit exceeded: requested ${cost} token(s), ${available.toFixed(2)} available`,
    );
    this.name = 'RateLimitExceededError';
  }
}

export class RateLimitTimeoutError extends ConnectorError {
  constructor(public readonly waited_ms: number) {
    super('rate_limit_timeout', `timed out after ${waited_ms}ms waiting for rate limit admission`);
    this.name = 'RateLimitTimeoutError';
  }
}

export class OperationCancelledError extends ConnectorError {
  constructor(message = 'operation cancelled', options?: { cause?: unknown }) {
    super('cancelled', message, false, options);
    this.name = 'OperationCancelledError';
  }
}

export type FailureKind =
  | 'connection'
  | 'network'
  | 'timeout'
  | 'rate_limited'
  | 'unavailable'
  | 'server'
  | 'client'
  | 'cancelled';

export class TransportError extends ConnectorError {
  constructor(
    public readonly failure: FailureKind,
    message: string,
    public readonly attempts: number,
    public readonly elapsed_ms: number,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(
      'transport_error',
      `${message} (${failure}, ${attempts} attempt${attempts === 1 ? '' : 's'}, ${elapsed_ms}ms)`,
      false,
      options,
    );
    this.name = 'TransportError';
  }
}

export type ArgumentIssue = {
  path: string;
  message: string;
};

export class ToolArgumentError extends ConnectorError {
  constructor(
    public readonly tool: string,
    public readonly issues: ReadonlyArray<ArgumentIssue>,
  ) {
    const detail = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    super('tool_argument_error', `invalid arguments for ${tool}: ${detail}`);
    this.name = 'ToolArgumentError';
  }
}

export class UnknownToolError extends ConnectorError {
  constructor(public readonly tool: string) {
    super('unknown_tool', `unknown tool: ${tool}`);
    this.name = 'UnknownToolError';
  }
}

export class DuplicateToolNameError extends ConnectorError {
  constructor(public readonly tool: string) {
    super('duplicate_tool_name', `tool already registered: ${tool}`);
    this.name = 'DuplicateToolNameError';
  }
}

export class ToolLoopBudgetExceededError extends ConnectorError {
  constructor(public readonly round_trips: number) {
    super(
      'tool_loop_budget_exceeded',
      `tool loop exceeded its budget of ${round_trips} round trip${round_trips === 1 ? '' : 's'}`,
    );
    this.name = 'ToolLoopBudgetExceededError';
  }
}

export class ToolLoopFatalError extends ConnectorError {
  constructor(
    public readonly tool_name: string,
    cause: unknown,
  ) {
    super(
      'tool_loop_fatal',
      `fatal error in tool ${tool_name}: ${cause instanceof Error ? cause.message : String(cause)}`,
      true,
      { cause },
    );
    this.name = 'ToolLoopFatalError';
  }
}

export class VendorApiError extends ConnectorError {
  constructor(
    public readonly vendor: string,
    message: string,
    public readonly status: number,
    public readonly errors: ReadonlyArray<string> = [],
  ) {
    super('vendor_api_error', `${vendor}: ${message}`);
    this.name = 'VendorApiError';
  }
}

export class ConfigError extends ConnectorError {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<ArgumentIssue> = [],
  ) {
    const detail = issues.length > 0
      ? `: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`
      : '';
    super('config_error', `${message}${detail}`, true);
    this.name = 'ConfigError';
  }
}

/**
 * Convert anything thrown into the structured `{ kind, message }` shape used on
 * the RPC surface and in tool results.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof ConnectorError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { kind: 'internal', message: error.message };
  }
  return { kind: 'internal', message: String(error) };
}

export function isConnectorError(error: unknown): error is ConnectorError {
  return error instanceof ConnectorError;
}
