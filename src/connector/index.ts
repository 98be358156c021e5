// pattern: Functional Core

export type {
  Connector,
  ConnectorInfo,
  Operation,
  OperationContext,
  OperationDefinition,
  OperationHandler,
  OperationParameter,
  ParameterType,
} from './types.ts';
export { createConnector } from './connector.ts';
export type { ConnectorOptions } from './connector.ts';
