// pattern: Imperative Shell

/**
 * Provider-neutral chat surface.
 * `chat` is a single completion that reports tool requests without running them;
 * `invoke` either does the same or hands the conversation to the tool-call loop.
 */

import { createToolCallLoop } from '../agent/loop.ts';
import type { LoopTransition, ToolCallRecord } from '../agent/types.ts';
import type { AgentConfig, AppConfig } from '../config/schema.ts';
import { ConfigError } from '../errors/index.ts';
import type { Logger } from '../logging/logger.ts';
import { componentLogger } from '../logging/logger.ts';
import { createModelProvider } from '../model/factory.ts';
import type { ModelProviderOptions } from '../model/factory.ts';
import type { Message, ModelProvider, StopReason, ToolDefinition, UsageStats } from '../model/types.ts';
import { textOf, toolUsesOf } from '../model/types.ts';
import { selectTools } from '../tool/adapters/callable.ts';
import type { ToolSelection } from '../tool/adapters/callable.ts';
import { toModelTools } from '../tool/adapters/chat.ts';
import type { ToolInvocation, ToolRegistry } from '../tool/types.ts';

export type AIResponse = {
  content: string;
  usage: UsageStats;
  tool_calls: Array<ToolInvocation>;
  stop_reason: StopReason;
};

export type ChatOptions = {
  history?: ReadonlyArray<Message>;
  system?: string;
  /** `true` offers every registered tool; a selection offers a subset. */
  tools?: boolean | ToolSelection;
  signal?: AbortSignal;
};

export type InvokeOptions = {
  use_tools: boolean;
  history?: ReadonlyArray<Message>;
  system?: string;
  tools?: ToolSelection;
  signal?: AbortSignal;
};

export type InvokeResult = {
  content: string;
  tool_calls: Array<ToolCallRecord>;
  usage: UsageStats;
  round_trips: number;
  messages: Array<Message>;
};

export type ChatClient = {
  readonly provider: string;
  readonly model: string;
  chat(message: string, options?: ChatOptions): Promise<AIResponse>;
  invoke(prompt: string, options: InvokeOptions): Promise<InvokeResult>;
};

export type ChatClientOptions = {
  provider: ModelProvider;
  model: string;
  max_tokens?: number;
  temperature?: number;
  registry?: ToolRegistry;
  loop?: Partial<AgentConfig>;
  onTransition?: (transition: LoopTransition) => void;
  logger?: Logger;
};

const DEFAULT_MAX_TOKENS = 4096;

export function createChatClient(options: ChatClientOptions): ChatClient {
  const log = componentLogger('chat', options.logger);
  const maxTokens = options.max_tokens ?? DEFAULT_MAX_TOKENS;

  function requireRegistry(): ToolRegistry {
    if (!options.registry) {
      throw new ConfigError('tools requested but the chat client has no tool registry');
    }
    return options.registry;
  }

  function offeredTools(tools: ChatOptions['tools']): Array<ToolDefinition> | undefined {
    if (tools === undefined || tools === false) {
      return undefined;
    }
    const snapshot = requireRegistry().list();
    return toModelTools(tools === true ? snapshot : selectTools(snapshot, tools));
  }

  function conversation(prompt: string, history: ReadonlyArray<Message> = []): Array<Message> {
    return [...history, { role: 'user', content: prompt }];
  }

  async function chat(message: string, chatOptions: ChatOptions = {}): Promise<AIResponse> {
    const response = await options.provider.complete({
      model: options.model,
      max_tokens: maxTokens,
      temperature: options.temperature,
      system: chatOptions.system,
      messages: conversation(message, chatOptions.history),
      tools: offeredTools(chatOptions.tools),
      signal: chatOptions.signal,
    });

    const toolCalls = toolUsesOf(response.content).map(
      (block): ToolInvocation =>
        block.invalid_arguments
          ? { id: block.id, name: block.name, arguments: block.input, invalid_arguments: block.invalid_arguments }
          : { id: block.id, name: block.name, arguments: block.input },
    );
    log.debug(
      { provider: options.provider.name, stop_reason: response.stop_reason, tool_calls: toolCalls.length },
      'chat completed',
    );

    return {
      content: textOf(response.content),
      usage: response.usage,
      tool_calls: toolCalls,
      stop_reason: response.stop_reason,
    };
  }

  async function invoke(prompt: string, invokeOptions: InvokeOptions): Promise<InvokeResult> {
    const messages = conversation(prompt, invokeOptions.history);

    if (!invokeOptions.use_tools) {
      const response = await chat(prompt, {
        history: invokeOptions.history,
        system: invokeOptions.system,
        signal: invokeOptions.signal,
      });
      return {
        content: response.content,
        tool_calls: [],
        usage: response.usage,
        round_trips: 1,
        messages: [...messages, { role: 'assistant', content: response.content }],
      };
    }

    const loop = createToolCallLoop({
      provider: options.provider,
      model: options.model,
      max_tokens: maxTokens,
      temperature: options.temperature,
      registry: requireRegistry(),
      config: options.loop,
      tools: invokeOptions.tools,
      onTransition: options.onTransition,
      logger: options.logger,
    });
    const result = await loop.run({ messages, system: invokeOptions.system, signal: invokeOptions.signal });

    return {
      content: textOf(result.response.content),
      tool_calls: result.tool_calls,
      usage: result.usage,
      round_trips: result.round_trips,
      messages: result.messages,
    };
  }

  return {
    provider: options.provider.name,
    model: options.model,
    chat,
    invoke,
  };
}

/**
 * Build a chat client from the `[model]` and `[agent]` sections of a loaded config.
 */
export function createChatClientFromConfig(
  config: AppConfig,
  options: ModelProviderOptions & { registry?: ToolRegistry; onTransition?: (transition: LoopTransition) => void } = {},
): ChatClient {
  if (!config.model) {
    throw new ConfigError('no [model] section configured');
  }
  const { registry, onTransition, ...providerOptions } = options;
  return createChatClient({
    provider: createModelProvider(config.model, providerOptions),
    model: config.model.name,
    max_tokens: config.model.max_tokens,
    temperature: config.model.temperature,
    registry,
    loop: config.agent,
    onTransition,
    logger: options.logger,
  });
}
