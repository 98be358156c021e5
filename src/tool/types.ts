// pattern: Functional Core

/**
 * Tool system types for registration, validation and dispatch.
 * A ToolDescriptor is derived once from a connector operation and never mutated;
 * every adapter is a projection of a snapshot of descriptors.
 */

import type { Connector, OperationParameter } from '../connector/types.ts';
import type { ArgumentIssue } from '../errors/index.ts';

export type JsonSchemaProperty = {
  type: string;
  description?: string;
  enum?: ReadonlyArray<string | number>;
  default?: unknown;
  minimum?: number;
  maximum?: number;
  items?: { type: string };
};

export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: Array<string>;
  additionalProperties: false;
};

export type ToolCallContext = {
  invocation_id: string;
  signal?: AbortSignal;
};

export type ToolHandler = (args: Record<string, unknown>, context: ToolCallContext) => Promise<unknown>;

export type ToolDescriptor = {
  readonly name: string;
  readonly connector: string;
  readonly operation: string;
  readonly description: string;
  readonly category: string;
  readonly parameters: ReadonlyArray<OperationParameter>;
  readonly input_schema: ToolInputSchema;
  readonly idempotent: boolean;
  readonly independent: boolean;
  readonly handler: ToolHandler;
};

export type ToolInvocation = {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Decoding failures; such an invocation fails validation without running. */
  invalid_arguments?: ReadonlyArray<ArgumentIssue>;
  signal?: AbortSignal;
};

export interface ToolRegistry {
  register(operation: string, connector: Connector): ToolDescriptor;
  /** All of a connector's operations, or none of them. */
  registerConnector(connector: Connector): Array<ToolDescriptor>;
  invoke(invocation: ToolInvocation): Promise<unknown>;
  list(): ReadonlyArray<ToolDescriptor>;
  get(name: string): ToolDescriptor | undefined;
}
