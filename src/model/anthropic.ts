// pattern: Imperative Shell

import Anthropic from "@anthropic-ai/sdk";
import type { ModelConfig } from "../config/schema.ts";
import type { CredentialResolver } from "../credentials/types.ts";
import type { Logger } from "../logging/logger.ts";
import { componentLogger } from "../logging/logger.ts";
import type { RateLimiter } from "../ratelimit/types.ts";
import type { Clock } from "../timing/clock.ts";
import { parseAnthropicToolUse, toAnthropicTools, toToolUseBlock } from "../tool/adapters/chat.ts";
import type { AnthropicContentBlock } from "../tool/adapters/chat.ts";
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
  UsageStats,
} from "./types.ts";
import { ModelError, textOf } from "./types.ts";

export type AnthropicMessage = {
  content: ReadonlyArray<AnthropicContentBlock>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
};

export type AnthropicMessagesCreate = (
  params: Anthropic.Messages.MessageCreateParamsNonStreaming,
  options?: { signal?: AbortSignal },
) => Promise<AnthropicMessage>;

export type AnthropicAdapterOptions = {
  credentials?: CredentialResolver;
  /** Credential holding the API key. Defaults to ANTHROPIC_API_KEY. */
  api_key_credential?: string;
  /** Replaces the SDK call; used by tests. */
  create?: AnthropicMessagesCreate;
  limiter?: RateLimiter;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
};

export function buildAnthropicSystemParam(
  requestSystem: string | undefined,
  messages: ReadonlyArray<Message>,
): string | undefined {
  const systemContents: Array<string> = [];

  if (requestSystem) {
    systemContents.push(requestSystem);
  }

  for (const msg of messages) {
    if (msg.role === "system") {
      const text = textOf(msg.content);
      if (text) {
        systemContents.push(text);
      }
    }
  }

  return systemContents.length > 0 ? systemContents.join("\n\n") : undefined;
}

function toBlockParam(block: ContentBlock): Anthropic.Messages.ContentBlockParam {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "tool_use":
      return { type: "tool_use", id: block.id, name: block.name, input: block.input };
    case "tool_result":
      return {
        type: "tool_result",
        tool_use_id: block.tool_use_id,
        content: block.content,
        is_error: block.is_error,
      };
  }
}

/**
 * System messages are lifted into the `system` param; tool-role messages travel as
 * user turns carrying `tool_result` blocks.
 */
export function toAnthropicMessages(messages: ReadonlyArray<Message>): Array<Anthropic.Messages.MessageParam> {
  return messages
    .filter((m) => m.role !== "system")
    .map((msg): Anthropic.Messages.MessageParam => ({
      role: msg.role === "assistant" ? "assistant" : "user",
      content: typeof msg.content === "string" ? msg.content : msg.content.map(toBlockParam),
    }));
}

function normalizeContent(blocks: ReadonlyArray<AnthropicContentBlock>): Array<ContentBlock> {
  const content: Array<ContentBlock> = [];
  for (const block of blocks) {
    if (block.type === "text" && block.text !== undefined) {
      content.push({ type: "text", text: block.text });
    }
  }
  for (const invocation of parseAnthropicToolUse(blocks)) {
    content.push(toToolUseBlock(invocation));
  }
  return content;
}

function normalizeUsage(usage: { input_tokens: number; output_tokens: number }): UsageStats {
  return {
    input_tokens: usage.input_tokens,
    output_tokens: usage.output_tokens,
  };
}

function normalizeStopReason(reason: string | null): StopReason {
  switch (reason) {
    case "tool_use":
      return "tool_use";
    case "max_tokens":
      return "max_tokens";
    case "stop_sequence":
      return "stop_sequence";
    default:
      return "end_turn";
  }
}

function translateError(error: unknown): unknown {
  if (error instanceof Anthropic.AuthenticationError || error instanceof Anthropic.PermissionDeniedError) {
    return new ModelError("auth", false, error.message || "authentication failed", error.status, { cause: error });
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded", error.status, { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out", undefined, { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new ModelError("api_error", true, error.message || "connection error", undefined, { cause: error });
  }
  if (error instanceof Anthropic.APIError) {
    return new ModelError("api_error", false, error.message || "api error", error.status, { cause: error });
  }
  return error;
}

export function createAnthropicAdapter(config: ModelConfig, options: AnthropicAdapterOptions = {}): ModelProvider {
  const log = componentLogger("model:anthropic", options.logger);
  const keyName = options.api_key_credential ?? "ANTHROPIC_API_KEY";
  const credentials = options.credentials
    ?? createModelCredentials(config, { name: keyName, required: true }, { env: options.env, logger: log });

  let create = options.create;

  async function messagesCreate(): Promise<AnthropicMessagesCreate> {
    if (create) {
      return create;
    }
    const apiKey = await credentials.resolve(keyName);
    const client = new Anthropic({
      apiKey: apiKey.value,
      baseURL: config.base_url,
      timeout: config.timeout_ms,
      maxRetries: 0,
    });
    create = (params, requestOptions) => client.messages.create(params, requestOptions);
    return create;
  }

  return {
    name: "anthropic",

    async complete(request: ModelRequest): Promise<ModelResponse> {
      const send = await messagesCreate();
      const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
        model: request.model,
        max_tokens: request.max_tokens,
        system: buildAnthropicSystemParam(request.system, request.messages),
        tools: request.tools && request.tools.length > 0 ? toAnthropicTools(request.tools) : undefined,
        temperature: request.temperature ?? config.temperature,
        messages: toAnthropicMessages(request.messages),
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
          operation: `anthropic ${request.model}`,
        },
      );

      log.debug({ model: request.model, attempts, stop_reason: response.stop_reason }, "completion received");

      return {
        content: normalizeContent(response.content),
        stop_reason: normalizeStopReason(response.stop_reason),
        usage: normalizeUsage(response.usage),
      };
    },
  };
}
