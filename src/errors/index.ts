// pattern: Functional Core

export type { ErrorKind, ErrorPayload, FailureKind, ArgumentIssue } from './errors.ts';

export {
  ConnectorError,
  CredentialNotFoundError,
  RateLimitExceededError,
  RateLimitTimeoutError,
  OperationCancelledError,
  TransportError,
  ToolArgumentError,
  UnknownToolError,
  DuplicateToolNameError,
  ToolLoopBudgetExceededError,
  ToolLoopFatalError,
  VendorApiError,
  ConfigError,
  toErrorPayload,
  isConnectorError,
} from './errors.ts';
