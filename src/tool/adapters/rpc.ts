// pattern: Imperative Shell

/**
 * RPC adapter. `createToolRpcHandler` is the transport-neutral request/response
 * surface; `createMcpServer` serves the same handler over the Model Context Protocol.
 * Errors are always returned as `{ error: { kind, message } }`, never thrown.
 */

import { randomUUID } from "node:crypto";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { toErrorPayload } from "../../errors/index.ts";
import type { ErrorPayload } from "../../errors/index.ts";
import type { Logger } from "../../logging/logger.ts";
import { componentLogger } from "../../logging/logger.ts";
import type { ToolInputSchema, ToolRegistry } from "../types.ts";

export type RpcToolInfo = {
  name: string;
  description: string;
  schema: ToolInputSchema;
};

export type RpcResult = { result: unknown } | { error: ErrorPayload };

const RpcRequestSchema = z.discriminatedUnion("method", [
  z.object({ method: z.literal("tools/list"), params: z.object({}).passthrough().optional() }),
  z.object({
    method: z.literal("tools/call"),
    params: z.object({
      name: z.string().min(1),
      arguments: z.record(z.unknown()).optional(),
    }),
  }),
]);

export type RpcRequest = z.infer<typeof RpcRequestSchema>;

export interface ToolRpcHandler {
  listTools(): { tools: Array<RpcToolInfo> };
  invokeTool(request: { name: string; arguments?: Record<string, unknown> }, signal?: AbortSignal): Promise<RpcResult>;
  handle(request: unknown, signal?: AbortSignal): Promise<RpcResult>;
}

export function createToolRpcHandler(registry: ToolRegistry, options: { logger?: Logger } = {}): ToolRpcHandler {
  const log = componentLogger("rpc", options.logger);

  const handler: ToolRpcHandler = {
    listTools() {
      return {
        tools: registry.list().map((tool) => ({
          name: tool.name,
          description: tool.description,
          schema: tool.input_schema,
        })),
      };
    },

    async invokeTool(request, signal) {
      const id = randomUUID();
      try {
        const result = await registry.invoke({
          id,
          name: request.name,
          arguments: request.arguments ?? {},
          signal,
        });
        return { result };
      } catch (error) {
        const payload = toErrorPayload(error);
        log.info({ tool: request.name, invocation_id: id, kind: payload.kind }, "tool call returned error");
        return { error: payload };
      }
    },

    async handle(request, signal) {
      const parsed = RpcRequestSchema.safeParse(request);
      if (!parsed.success) {
        return {
          error: {
            kind: "invalid_request",
            message: parsed.error.issues.map((i) => `${i.path.join(".") || "request"}: ${i.message}`).join("; "),
          },
        };
      }
      if (parsed.data.method === "tools/list") {
        return { result: handler.listTools() };
      }
      return handler.invokeTool(parsed.data.params, signal);
    },
  };

  return handler;
}

function render(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value ?? null);
}

export function createMcpServer(
  registry: ToolRegistry,
  info: { name: string; version: string },
  options: { logger?: Logger } = {},
): Server {
  const handler = createToolRpcHandler(registry, options);
  const server = new Server(info, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: handler.listTools().tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.schema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const outcome = await handler.invokeTool(
      { name: request.params.name, arguments: request.params.arguments },
      extra.signal,
    );
    if ("error" in outcome) {
      return {
        content: [{ type: "text", text: JSON.stringify({ error: outcome.error }) }],
        isError: true,
      };
    }
    return { content: [{ type: "text", text: render(outcome.result) }] };
  });

  return server;
}

export async function serveMcpOverStdio(
  registry: ToolRegistry,
  info: { name: string; version: string },
  options: { logger?: Logger } = {},
): Promise<Server> {
  const server = createMcpServer(registry, info, options);
  await server.connect(new StdioServerTransport());
  componentLogger("rpc", options.logger).info({ server: info.name }, "mcp server listening on stdio");
  return server;
}
