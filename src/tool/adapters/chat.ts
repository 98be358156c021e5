// pattern: Functional Core

/**
 * Chat tool-call adapter: formats descriptors the way each provider expects for
 * function calling, and turns a provider's tool-call directives back into
 * ToolInvocations.
 */

import type Anthropic from "@anthropic-ai/sdk";
import type OpenAI from "openai";
import type { ArgumentIssue } from "../../errors/index.ts";
import type { ToolDefinition, ToolUseBlock } from "../../model/types.ts";
import type { ToolDescriptor, ToolInvocation } from "../types.ts";

/** Content block as returned by the Anthropic Messages API. */
export type AnthropicContentBlock = {
  type: string;
  text?: string;
  id?: string;
  name?: string;
  input?: unknown;
};

/** Tool call as returned by an OpenAI-compatible chat completion. */
export type OpenAIToolCall = {
  id: string;
  type?: string;
  function: { name: string; arguments: string };
};

export function toModelTools(snapshot: ReadonlyArray<ToolDescriptor>): Array<ToolDefinition> {
  return snapshot.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.input_schema,
  }));
}

export function toAnthropicTools(tools: ReadonlyArray<ToolDefinition>): Array<Anthropic.Messages.Tool> {
  return tools.map((tool): Anthropic.Messages.Tool => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.input_schema, type: "object" },
  }));
}

export function toOpenAITools(tools: ReadonlyArray<ToolDefinition>): Array<OpenAI.Chat.ChatCompletionTool> {
  return tools.map((tool): OpenAI.Chat.ChatCompletionTool => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.input_schema,
    },
  }));
}

const NOT_JSON: ArgumentIssue = { path: "", message: "arguments are not valid JSON" };
const NOT_AN_OBJECT: ArgumentIssue = { path: "", message: "arguments must be an object" };

/** Block for a decoded invocation; decoding failures ride along on the block. */
export function toToolUseBlock(invocation: ToolInvocation): ToolUseBlock {
  const block: ToolUseBlock = { type: "tool_use", id: invocation.id, name: invocation.name, input: invocation.arguments };
  if (invocation.invalid_arguments) {
    block.invalid_arguments = invocation.invalid_arguments;
  }
  return block;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseAnthropicToolUse(content: ReadonlyArray<AnthropicContentBlock>): Array<ToolInvocation> {
  const invocations: Array<ToolInvocation> = [];
  for (const block of content) {
    if (block.type !== "tool_use" || block.id === undefined || block.name === undefined) {
      continue;
    }
    const input = block.input ?? {};
    invocations.push(
      isRecord(input)
        ? { id: block.id, name: block.name, arguments: input }
        : { id: block.id, name: block.name, arguments: {}, invalid_arguments: [NOT_AN_OBJECT] },
    );
  }
  return invocations;
}

export function parseOpenAIToolCalls(calls: ReadonlyArray<OpenAIToolCall> | null | undefined): Array<ToolInvocation> {
  if (!calls) {
    return [];
  }
  return calls.map((call): ToolInvocation => {
    let parsed: unknown;
    try {
      parsed = call.function.arguments.trim() === "" ? {} : JSON.parse(call.function.arguments);
    } catch {
      return { id: call.id, name: call.function.name, arguments: {}, invalid_arguments: [NOT_JSON] };
    }
    if (!isRecord(parsed)) {
      return { id: call.id, name: call.function.name, arguments: {}, invalid_arguments: [NOT_AN_OBJECT] };
    }
    return { id: call.id, name: call.function.name, arguments: parsed };
  });
}
