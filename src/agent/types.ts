// pattern: Functional Core

/**
 * Types for the bounded tool-call loop.
 * The loop owns no conversation state between runs: callers pass the messages in
 * and get the extended conversation back.
 */

import type { AgentConfig } from '../config/schema.ts';
import type { ErrorPayload } from '../errors/index.ts';
import type { Logger } from '../logging/logger.ts';
import type { Message, ModelProvider, ModelResponse, UsageStats } from '../model/types.ts';
import type { ToolSelection } from '../tool/adapters/callable.ts';
import type { ToolRegistry } from '../tool/types.ts';

export type LoopState =
  | 'awaiting_model'
  | 'model_responded'
  | 'tool_call_requested'
  | 'tool_executing'
  | 'tool_result_appended'
  | 'done';

export type LoopTransition = {
  from: LoopState;
  to: LoopState;
  round_trip: number;
};

export type ToolCallRecord = {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  round_trip: number;
  result?: unknown;
  error?: ErrorPayload;
};

export type ToolLoopOptions = {
  provider: ModelProvider;
  model: string;
  registry: ToolRegistry;
  max_tokens: number;
  config?: Partial<AgentConfig>;
  temperature?: number;
  /** Limits which registered tools the model is offered. */
  tools?: ToolSelection;
  onTransition?: (transition: LoopTransition) => void;
  logger?: Logger;
};

export type ToolLoopInput = {
  messages: ReadonlyArray<Message>;
  system?: string;
  signal?: AbortSignal;
};

export type ToolLoopResult = {
  /** Final model response; it requested no tools. */
  response: ModelResponse;
  /** Input conversation followed by every turn the loop appended. */
  messages: Array<Message>;
  round_trips: number;
  tool_calls: Array<ToolCallRecord>;
  usage: UsageStats;
};

export type ToolCallLoop = {
  run(input: ToolLoopInput): Promise<ToolLoopResult>;
};
