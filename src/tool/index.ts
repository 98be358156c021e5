// pattern: Functional Core

export type {
  JsonSchemaProperty,
  ToolCallContext,
  ToolDescriptor,
  ToolHandler,
  ToolInputSchema,
  ToolInvocation,
  ToolRegistry,
} from './types.ts';

export { createToolRegistry } from './registry.ts';
export { createArgumentValidator, deriveInputSchema, normalizeName, toolName, MAX_TOOL_NAME_LENGTH } from './schema.ts';
export type { ArgumentValidator } from './schema.ts';
export { toCallableTools, selectTools } from './adapters/callable.ts';
export type { CallableTool, ToolSelection } from './adapters/callable.ts';
export { createToolRpcHandler, createMcpServer, serveMcpOverStdio } from './adapters/rpc.ts';
export type { RpcRequest, RpcResult, RpcToolInfo, ToolRpcHandler } from './adapters/rpc.ts';
export {
  toModelTools,
  toAnthropicTools,
  toOpenAITools,
  parseAnthropicToolUse,
  parseOpenAIToolCalls,
} from './adapters/chat.ts';
export type { AnthropicContentBlock, OpenAIToolCall } from './adapters/chat.ts';
