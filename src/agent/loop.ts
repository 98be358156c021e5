// pattern: Imperative Shell

/**
 * Bounded tool-call loop.
 * Each round trip sends the whole conversation plus tool schemas; requested tools
 * run through the callable adapter and their results go back as one `tool` turn.
 */

import {
  ConnectorError,
  ToolLoopBudgetExceededError,
  ToolArgumentError,
  ToolLoopFatalError,
  UnknownToolError,
  toErrorPayload,
} from '../errors/index.ts';
import { componentLogger } from '../logging/logger.ts';
import type { Message, ToolResultBlock, ToolUseBlock, UsageStats } from '../model/types.ts';
import { toolUsesOf } from '../model/types.ts';
import { selectTools, toCallableTools } from '../tool/adapters/callable.ts';
import type { CallableTool } from '../tool/adapters/callable.ts';
import { toModelTools } from '../tool/adapters/chat.ts';
import type {
  LoopState,
  ToolCallLoop,
  ToolCallRecord,
  ToolLoopInput,
  ToolLoopOptions,
  ToolLoopResult,
} from './types.ts';

export const DEFAULT_MAX_TOOL_ROUNDS = 20;

/**
 * Errors that end the loop instead of being reported to the model: missing
 * credentials, authentication failures, and anything else flagged `fatal`.
 */
export function isFatal(error: unknown): boolean {
  if (error instanceof ConnectorError) {
    return error.fatal;
  }
  return typeof error === 'object' && error !== null && 'fatal' in error && error.fatal === true;
}

export function renderToolResult(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return value === undefined ? 'null' : JSON.stringify(value);
}

type Outcome = {
  block: ToolResultBlock;
  record: ToolCallRecord;
};

export function createToolCallLoop(options: ToolLoopOptions): ToolCallLoop {
  const log = componentLogger('tool-loop', options.logger);
  const maxRounds = options.config?.max_tool_rounds ?? DEFAULT_MAX_TOOL_ROUNDS;
  const parallel = options.config?.parallel_tool_calls ?? false;

  async function execute(
    call: ToolUseBlock,
    tools: ReadonlyMap<string, CallableTool>,
    roundTrip: number,
    signal: AbortSignal | undefined,
  ): Promise<Outcome> {
    const record: ToolCallRecord = { id: call.id, name: call.name, arguments: call.input, round_trip: roundTrip };
    try {
      const tool = tools.get(call.name);
      if (!tool) {
        throw new UnknownToolError(call.name);
      }
      if (call.invalid_arguments && call.invalid_arguments.length > 0) {
        throw new ToolArgumentError(call.name, call.invalid_arguments);
      }
      const result = await tool.invoke(call.input, { id: call.id, signal });
      record.result = result;
      return {
        record,
        block: { type: 'tool_result', tool_use_id: call.id, content: renderToolResult(result) },
      };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (isFatal(error)) {
        log.error({ tool: call.name, round_trip: roundTrip, error: toErrorPayload(error) }, 'fatal tool error');
        throw new ToolLoopFatalError(call.name, error);
      }
      const payload = toErrorPayload(error);
      record.error = payload;
      return {
        record,
        block: {
          type: 'tool_result',
          tool_use_id: call.id,
          content: JSON.stringify({ error: payload }),
          is_error: true,
        },
      };
    }
  }

  async function executeAll(
    calls: ReadonlyArray<ToolUseBlock>,
    tools: ReadonlyMap<string, CallableTool>,
    roundTrip: number,
    signal: AbortSignal | undefined,
  ): Promise<Array<Outcome>> {
    const concurrent = parallel && calls.length > 1 && calls.every((call) => tools.get(call.name)?.independent === true);
    if (concurrent) {
      // Promise.all keeps request order regardless of completion order.
      return Promise.all(calls.map((call) => execute(call, tools, roundTrip, signal)));
    }
    const outcomes: Array<Outcome> = [];
    for (const call of calls) {
      outcomes.push(await execute(call, tools, roundTrip, signal));
    }
    return outcomes;
  }

  return {
    async run(input: ToolLoopInput): Promise<ToolLoopResult> {
      const snapshot = selectTools(options.registry.list(), options.tools);
      const tools = new Map(toCallableTools(snapshot, options.registry).map((tool) => [tool.name, tool]));
      const definitions = toModelTools(snapshot);

      const messages: Array<Message> = [...input.messages];
      const toolCalls: Array<ToolCallRecord> = [];
      const usage: UsageStats = { input_tokens: 0, output_tokens: 0 };
      let state: LoopState = 'awaiting_model';

      function transition(to: LoopState, roundTrip: number): void {
        const from = state;
        state = to;
        log.debug({ from, to, round_trip: roundTrip }, 'loop transition');
        options.onTransition?.({ from, to, round_trip: roundTrip });
      }

      for (let roundTrip = 1; ; roundTrip++) {
        const response = await options.provider.complete({
          model: options.model,
          max_tokens: options.max_tokens,
          system: input.system,
          messages,
          tools: definitions,
          temperature: options.temperature,
          signal: input.signal,
        });
        usage.input_tokens += response.usage.input_tokens;
        usage.output_tokens += response.usage.output_tokens;
        transition('model_responded', roundTrip);

        const calls = toolUsesOf(response.content);
        if (calls.length === 0) {
          messages.push({ role: 'assistant', content: response.content });
          transition('done', roundTrip);
          log.info({ round_trips: roundTrip, tool_calls: toolCalls.length, ...usage }, 'tool loop finished');
          return { response, messages, round_trips: roundTrip, tool_calls: toolCalls, usage };
        }

        if (roundTrip >= maxRounds) {
          log.warn({ round_trips: roundTrip, requested: calls.map((call) => call.name) }, 'tool loop budget exhausted');
          throw new ToolLoopBudgetExceededError(roundTrip);
        }

        transition('tool_call_requested', roundTrip);
        messages.push({ role: 'assistant', content: response.content });

        transition('tool_executing', roundTrip);
        const outcomes = await executeAll(calls, tools, roundTrip, input.signal);
        messages.push({ role: 'tool', content: outcomes.map((outcome) => outcome.block) });
        toolCalls.push(...outcomes.map((outcome) => outcome.record));

        transition('tool_result_appended', roundTrip);
        transition('awaiting_model', roundTrip + 1);
      }
    },
  };
}
