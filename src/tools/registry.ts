/**
 * @file tools/registry
 * @description Central list of every tool the server exposes.
 */

import { compartmentToolDefinitions } from "./handlers/compartment-tools.js";
import { instanceToolDefinitions } from "./handlers/instance-tools.js";
import type { ToolDefinition } from "./types.js";

export const toolRegistry: readonly ToolDefinition[] = [
  ...compartmentToolDefinitions,
  ...instanceToolDefinitions,
];

export const toolRegistryMap: ReadonlyMap<string, ToolDefinition> = new Map(
  toolRegistry.map((definition) => [definition.name, definition]),
);
