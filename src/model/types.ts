// pattern: Functional Core

/**
 * Shared types for model providers.
 * These types define the port interface that all model adapters normalize to.
 */

import { ConnectorError } from "../errors/index.ts";
import type { ArgumentIssue } from "../errors/index.ts";

export type TextBlock = {
  type: "text";
  text: string;
};

export type ToolUseBlock = {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
  /** Set when the provider's arguments could not be decoded into an object. */
  invalid_arguments?: ReadonlyArray<ArgumentIssue>;
};

export type ToolResultBlock = {
  type: "tool_result";
  tool_use_id: string;
  content: string;
  is_error?: boolean;
};

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export type ToolDefinition = {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
};

export type Role = "user" | "assistant" | "system" | "tool";

export type Message = {
  role: Role;
  content: string | Array<ContentBlock>;
};

export type ModelRequest = {
  messages: ReadonlyArray<Message>;
  system?: string;
  tools?: ReadonlyArray<ToolDefinition>;
  model: string;
  max_tokens: number;
  temperature?: number;
  signal?: AbortSignal;
};

export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "stop_sequence";

export type UsageStats = {
  input_tokens: number;
  output_tokens: number;
};

export type ModelResponse = {
  content: Array<ContentBlock>;
  stop_reason: StopReason;
  usage: UsageStats;
};

export type ModelErrorCode = "auth" | "rate_limit" | "timeout" | "api_error";

export class ModelError extends ConnectorError {
  constructor(
    public readonly code: ModelErrorCode,
    public readonly retryable: boolean = false,
    message: string = "",
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super("model_error", message, code === "auth", options);
    this.name = "ModelError";
  }
}

export interface ModelProvider {
  readonly name: string;
  complete(request: ModelRequest): Promise<ModelResponse>;
}

export function textOf(content: string | ReadonlyArray<ContentBlock>): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .filter((b): b is TextBlock => b.type === "text")
    .map((b) => b.text)
    .join("\n");
}

export function toolUsesOf(content: ReadonlyArray<ContentBlock>): Array<ToolUseBlock> {
  return content.filter((b): b is ToolUseBlock => b.type === "tool_use");
}
