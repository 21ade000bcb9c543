/**
 * @file mcp-server
 * @description Builds an MCP `Server` whose tool list and tool calls are served
 * from the registry through `ToolHandlers`.
 * @remarks Arguments reach `ToolHandlers.callTool` unvalidated; `defineTool`
 * checks them, so malformed input still gets the `{"error": ...}` envelope.
 */

import * as z from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { toolRegistry } from "./tools/registry.js";
import type { ToolHandlers } from "./tools/tool-handlers.js";
import type { ToolDefinition } from "./tools/types.js";

export const SERVER_VERSION = "1.0.0";

/** JSON Schema advertised for a tool's arguments. */
export function toToolInputSchema(schema: z.ZodObject): Tool["inputSchema"] {
  const jsonSchema = z.toJSONSchema(schema);
  const properties: Record<string, object> = {};
  for (const [key, value] of Object.entries(jsonSchema.properties ?? {})) {
    if (typeof value === "object") properties[key] = value;
  }
  return {
    type: "object",
    properties,
    ...(jsonSchema.required && jsonSchema.required.length > 0
      ? { required: jsonSchema.required }
      : {}),
  };
}

function toTool(definition: ToolDefinition): Tool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: toToolInputSchema(definition.inputSchema),
  };
}

/**
 * Creates a configured MCP server instance and binds all registered tools.
 *
 * @param serverName - Name reported to clients during `initialize`.
 * @param definitions - Tools to advertise; the full registry by default.
 */
export function createMcpServerInstance(
  toolHandlers: ToolHandlers,
  serverName: string,
  definitions: readonly ToolDefinition[] = toolRegistry,
): Server {
  const server = new Server(
    { name: serverName, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );
  const tools = definitions.map(toTool);

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { text, isError } = await toolHandlers.callTool(
      request.params.name,
      request.params.arguments ?? {},
    );
    return { content: [{ type: "text", text }], isError };
  });

  return server;
}
