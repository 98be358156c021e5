// pattern: Functional Core

/**
 * Generic-callable adapter: `(name, description, schema, invoke)` for direct use.
 */

import { randomUUID } from "node:crypto";
import type { ToolDescriptor, ToolInputSchema, ToolRegistry } from "../types.ts";

export type CallableTool = {
  name: string;
  description: string;
  category: string;
  schema: ToolInputSchema;
  independent: boolean;
  invoke(args: Record<string, unknown>, options?: { id?: string; signal?: AbortSignal }): Promise<unknown>;
};

export function toCallableTools(
  snapshot: ReadonlyArray<ToolDescriptor>,
  registry: ToolRegistry,
): Array<CallableTool> {
  return snapshot.map((tool) => ({
    name: tool.name,
    description: tool.description,
    category: tool.category,
    schema: tool.input_schema,
    independent: tool.independent,
    invoke: (args, options = {}) =>
      registry.invoke({
        id: options.id ?? randomUUID(),
        name: tool.name,
        arguments: args,
        signal: options.signal,
      }),
  }));
}

export type ToolSelection = {
  categories?: ReadonlyArray<string>;
  names?: ReadonlyArray<string>;
};

/**
 * Filter a snapshot by category tag and/or exact tool name. An empty selection keeps everything.
 */
export function selectTools(
  snapshot: ReadonlyArray<ToolDescriptor>,
  selection: ToolSelection = {},
): Array<ToolDescriptor> {
  const { categories, names } = selection;
  return snapshot.filter(
    (tool) =>
      (categories === undefined || categories.includes(tool.category)) &&
      (names === undefined || names.includes(tool.name)),
  );
}
