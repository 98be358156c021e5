// pattern: Imperative Shell

import OpenAI from "openai";
import type { ModelConfig } from "../config/schema.ts";
import type { CredentialResolver } from "../credentials/types.ts";
import type { Logger } from "../logging/logger.ts";
import { componentLogger } from "../logging/logger.ts";
import type { RateLimiter } from "../ratelimit/types.ts";
import type { Clock } from "../timing/clock.ts";
import { parseOpenAIToolCalls, toOpenAITools, toToolUseBlock } from "../tool/adapters/chat.ts";
import type { OpenAIToolCall } from "../tool/adapters/chat.ts";
import { callWithRetry } from "../transport/retry.ts";
import { createModelCredentials } from "./credentials.ts";
import { classifyModelFailure } from "./retry.ts";
import type {
  ContentBlock,
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  StopReason,
  ToolResultBlock,
  ToolUseBlock,
} from "./types.ts";
import { ModelError, textOf, toolUsesOf } from "./types.ts";

export type OpenAIChatCompletion = {
  choices: ReadonlyArray<{
    message: { content: string | null; tool_calls?: ReadonlyArray<OpenAIToolCall> };
    finish_reason: string | null;
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
};

export type OpenAIChatCreate = (
  params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
  options?: { signal?: AbortSignal },
) => Promise<OpenAIChatCompletion>;

export type OpenAICompatAdapterOptions = {
  credentials?: CredentialResolver;
  /** Credential holding the API key. Defaults to OPENAI_API_KEY. */
  api_key_credential?: string;
  /** Keyless endpoints (a local server) may leave the key unset. */
  api_key_required?: boolean;
  /** Used when `config.base_url` is unset. */
  default_base_url?: string;
  /** Provider name reported on the adapter and in logs. */
  name?: string;
  /** Replaces the SDK call; used by tests. */
  create?: OpenAIChatCreate;
  limiter?: RateLimiter;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
};

// The SDK refuses to construct without a key even when the server ignores it.
const KEYLESS_PLACEHOLDER = "unused";

function toAssistantToolCall(block: ToolUseBlock): OpenAI.Chat.ChatCompletionMessageToolCall {
  return {
    id: block.id,
    type: "function",
    function: { name: block.name, arguments: JSON.stringify(block.input) },
  };
}

/**
 * One common message can become several OpenAI messages: each tool result is its
 * own `tool` message keyed by `tool_call_id`.
 */
export function normalizeMessage(msg: Message): Array<OpenAI.Chat.ChatCompletionMessageParam> {
  switch (msg.role) {
    case "system":
      return [{ role: "system", content: textOf(msg.content) }];
    case "user":
      return [{ role: "user", content: textOf(msg.content) }];
    case "assistant": {
      if (typeof msg.content === "string") {
        return [{ role: "assistant", content: msg.content }];
      }
      const text = textOf(msg.content);
      const toolCalls = toolUsesOf(msg.content).map(toAssistantToolCall);
      const assistant: OpenAI.Chat.ChatCompletionAssistantMessageParam = {
        role: "assistant",
        content: text || null,
      };
      if (toolCalls.length > 0) {
        assistant.tool_calls = toolCalls;
      }
      return [assistant];
    }
    case "tool": {
      if (typeof msg.content === "string") {
        return [{ role: "user", content: msg.content }];
      }
      return msg.content
        .filter((b): b is ToolResultBlock => b.type === "tool_result")
        .map((b): OpenAI.Chat.ChatCompletionToolMessageParam => ({
          role: "tool",
          tool_call_id: b.tool_use_id,
          content: b.content,
        }));
    }
  }
}

function normalizeContent(content: string | null, toolCalls: ReadonlyArray<OpenAIToolCall> | undefined): Array<ContentBlock> {
  const blocks: Array<ContentBlock> = [];

  if (content) {
    blocks.push({
      type: "text",
      text: content,
    });
  }

  for (const invocation of parseOpenAIToolCalls(toolCalls)) {
    blocks.push(toToolUseBlock(invocation));
  }

  return blocks;
}

function normalizeStopReason(finishReason: string | null): StopReason {
  if (finishReason === "tool_calls") {
    return "tool_use";
  }
  if (finishReason === "length") {
    return "max_tokens";
  }
  return "end_turn";
}

function translateError(error: unknown): unknown {
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new ModelError("auth", false, error.message || "authentication failed", error.status, { cause: error });
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded", error.status, { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out", undefined, { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ModelError("api_error", true, error.message || "connection error", undefined, { cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    return new ModelError("api_error", false, error.message || "api error", error.status, { cause: error });
  }
  return error;
}

export function createOpenAICompatAdapter(config: ModelConfig, options: OpenAICompatAdapterOptions = {}): ModelProvider {
  const name = options.name ?? config.provider;
  const log = componentLogger(`model:${name}`, options.logger);
  const keyName = options.api_key_credential ?? "OPENAI_API_KEY";
  const credentials = options.credentials
    ?? createModelCredentials(
      config,
      { name: keyName, required: options.api_key_required ?? true },
      { env: options.env, logger: log },
    );

  let create = options.create;

  async function chatCreate(): Promise<OpenAIChatCreate> {
    if (create) {
      return create;
    }
    const apiKey = await credentials.resolve(keyName);
    const client = new OpenAI({
      apiKey: apiKey.present ? apiKey.value : KEYLESS_PLACEHOLDER,
      baseURL: config.base_url ?? options.default_base_url,
      timeout: config.timeout_ms,
      maxRetries: 0,
    });
    create = (params, requestOptions) => client.chat.completions.create(params, requestOptions);
    return create;
  }

  return {
    name,

    async complete(request: ModelRequest): Promise<ModelResponse> {
      const send = await chatCreate();
      const messages: Array<OpenAI.Chat.ChatCompletionMessageParam> = [];

      if (request.system) {
        messages.push({
          role: "system",
          content: request.system,
        });
      }

      messages.push(...request.messages.flatMap(normalizeMessage));

      const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
        model: request.model,
        max_tokens: request.max_tokens,
        tools: request.tools && request.tools.length > 0 ? toOpenAITools(request.tools) : undefined,
        temperature: request.temperature ?? config.temperature,
        messages,
      };

      const { value: response, attempts } = await callWithRetry(
        async () => {
          try {
            return await send(params, { signal: request.signal });
          } catch (error) {
            throw translateError(error);
          }
        },
        {
          policy: config.retry,
          classify: classifyModelFailure,
          idempotent: true,
          limiter: options.limiter,
          signal: request.signal,
          clock: options.clock,
          random: options.random,
          logger: log,
          operation: `${name} ${request.model}`,
        },
      );

      const choice = response.choices[0];
      if (!choice) {
        throw new ModelError("api_error", false, "no choices in response");
      }

      log.debug({ model: request.model, attempts, finish_reason: choice.finish_reason }, "completion received");

      return {
        content: normalizeContent(choice.message.content, choice.message.tool_calls),
        stop_reason: normalizeStopReason(choice.finish_reason),
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
      };
    },
  };
}
