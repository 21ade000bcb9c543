/**
 * @file tools/types
 * @description Shared type contracts for tool registration and runtime dispatch.
 * @remarks These types define the bridge between registry definitions and handlers.
 */

import type * as z from "zod";
import type { ServerConfig } from "../config.js";
import type { CompartmentDirectory } from "../engines/compartment-directory.js";
import type { LifecycleCoordinator } from "../engines/lifecycle-coordinator.js";
import type { ComputeBackend } from "../oci/types.js";
import type { ToolResult } from "../utils/errors.js";

/**
 * Everything a tool implementation may touch. Built once at startup and
 * shared read-only by every invocation.
 */
export interface ToolContext {
  config: ServerConfig;
  compute: ComputeBackend;
  compartments: CompartmentDirectory;
  coordinator: LifecycleCoordinator;
}

/**
 * Authoring form of a tool: `impl` receives arguments already parsed against
 * `inputSchema`.
 */
export interface ToolSpec<S extends z.ZodObject> {
  name: string;
  description: string;
  inputSchema: S;
  impl(args: z.output<S>, ctx: ToolContext): Promise<ToolResult<unknown>>;
}

/**
 * Registry contract for a single tool definition, with the argument type
 * erased so definitions of different shapes can share one list.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodObject;
  run(rawArgs: unknown, ctx: ToolContext): Promise<ToolResult<unknown>>;
}
