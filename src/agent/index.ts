// pattern: Functional Core

/**
 * Tool-call loop module exports
 */

export type {
  LoopState,
  LoopTransition,
  ToolCallLoop,
  ToolCallRecord,
  ToolLoopInput,
  ToolLoopOptions,
  ToolLoopResult,
} from './types.ts';
export { createToolCallLoop, isFatal, renderToolResult, DEFAULT_MAX_TOOL_ROUNDS } from './loop.ts';
