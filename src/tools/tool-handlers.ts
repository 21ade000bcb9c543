/**
 * Tool Handlers
 * The single boundary between tool implementations and the transport: looks
 * the tool up, runs it, and turns its `ToolResult` into JSON text. Nothing
 * thrown below this layer escapes as a protocol fault.
 */

import type { ServerConfig } from "../config.js";
import { CompartmentDirectory } from "../engines/compartment-directory.js";
import { LifecycleCoordinator } from "../engines/lifecycle-coordinator.js";
import type { ComputeBackend, IdentityBackend } from "../oci/types.js";
import { extendRequestContext } from "../request-context.js";
import { describeError, fail, ToolError, type ToolResult } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { toolRegistryMap } from "./registry.js";
import { ResponseFormatter } from "./response-formatter.js";
import type { ToolContext, ToolDefinition } from "./types.js";

/** Serialized tool output; `isError` is set when `text` is an error envelope. */
export interface ToolOutput {
  text: string;
  isError: boolean;
}

export interface Backends {
  compute: ComputeBackend;
  identity: IdentityBackend;
}

export function createToolContext(config: ServerConfig, backends: Backends): ToolContext {
  return {
    config,
    compute: backends.compute,
    compartments: new CompartmentDirectory(backends.identity, config.tenancyId),
    coordinator: new LifecycleCoordinator(backends.compute),
  };
}

export class ToolHandlers {
  private readonly responseFormatter = new ResponseFormatter();

  constructor(
    public readonly context: ToolContext,
    private readonly registry: ReadonlyMap<string, ToolDefinition> = toolRegistryMap,
  ) {}

  static create(config: ServerConfig, backends: Backends): ToolHandlers {
    return new ToolHandlers(createToolContext(config, backends));
  }

  get toolNames(): string[] {
    return [...this.registry.keys()];
  }

  async callTool(toolName: string, rawArgs: unknown): Promise<ToolOutput> {
    return extendRequestContext({ toolName }, async () => {
      logger.debug("[callTool] ENTER", {
        args: JSON.stringify(rawArgs ?? {}).slice(0, 256),
      });

      const definition = this.registry.get(toolName);
      if (!definition) {
        logger.warn("[callTool] TOOL_NOT_FOUND", { registered: this.toolNames.join(", ") });
        return this.failure(
          new ToolError("UNKNOWN_TOOL", `Tool not found in handler registry: ${toolName}`),
        );
      }

      let result: ToolResult<unknown>;
      try {
        result = await definition.run(rawArgs, this.context);
      } catch (error) {
        logger.error("[callTool] UNCAUGHT_EXCEPTION", error);
        result = fail(
          "BACKEND_CALL_FAILED",
          `Unexpected error in ${toolName}: ${describeError(error)}`,
          error,
        );
      }

      if (!result.ok) {
        return this.failure(result.error);
      }

      try {
        const text = this.responseFormatter.formatSuccess(result.value);
        logger.info("[callTool] EXIT", { status: "ok" });
        return { text, isError: false };
      } catch (error) {
        logger.error("[callTool] SERIALIZATION_FAILED", error);
        return this.failure(
          new ToolError(
            "BACKEND_CALL_FAILED",
            `Failed to serialize ${toolName} result: ${describeError(error)}`,
          ),
        );
      }
    });
  }

  private failure(error: ToolError): ToolOutput {
    logger.warn("[callTool] EXIT", { status: "error", code: error.code, reason: error.message });
    return { text: this.responseFormatter.errorEnvelope(error), isError: true };
  }
}
