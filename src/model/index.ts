// pattern: Functional Core

export type {
  TextBlock,
  ToolUseBlock,
  ToolResultBlock,
  ContentBlock,
  ToolDefinition,
  Role,
  Message,
  ModelRequest,
  StopReason,
  UsageStats,
  ModelResponse,
  ModelErrorCode,
  ModelProvider,
} from "./types.ts";

export { ModelError, textOf, toolUsesOf } from "./types.ts";
export { createAnthropicAdapter, buildAnthropicSystemParam, toAnthropicMessages } from "./anthropic.ts";
export type { AnthropicAdapterOptions, AnthropicMessage, AnthropicMessagesCreate } from "./anthropic.ts";
export { createOpenAICompatAdapter, normalizeMessage } from "./openai-compat.ts";
export type { OpenAIChatCompletion, OpenAIChatCreate, OpenAICompatAdapterOptions } from "./openai-compat.ts";
export { createModelProvider, OPENAI_COMPATIBLE_PRESETS } from "./factory.ts";
export type { ModelProviderOptions } from "./factory.ts";
export { classifyModelFailure } from "./retry.ts";
export { createModelCredentials } from "./credentials.ts";
