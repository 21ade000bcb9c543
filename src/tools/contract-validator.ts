/**
 * @file tools/contract-validator
 * @description Zod-based schema validation for tool arguments, and the
 * `defineTool` helper that puts it in front of every tool implementation.
 */

import type * as z from "zod";
import { fail } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import type { ToolDefinition, ToolSpec } from "./types.js";

// ─── Public contract ────────────────────────────────────────────────────────

/**
 * The result of validating tool arguments against the declared schema.
 */
export type ContractValidation<T> =
  | {
      valid: true;
      data: T;
      /**
       * Advisory messages for fields that are not part of the schema. These
       * usually indicate a typo in a parameter name and never fail the call.
       */
      warnings: string[];
    }
  | {
      valid: false;
      /** `<field>: <problem>` for each incorrect or missing field. */
      errors: string[];
      warnings: string[];
    };

// ─── Implementation ─────────────────────────────────────────────────────────

/**
 * Validate `args` against a tool's input schema.
 *
 * @param toolName - Tool name, used in warning messages.
 * @param args     - Raw unvalidated arguments (may be `null` / `undefined`).
 */
export function validateToolArgs<S extends z.ZodObject>(
  toolName: string,
  inputSchema: S,
  args: unknown,
): ContractValidation<z.output<S>> {
  const supplied = args ?? {};
  const inputKeys =
    typeof supplied === "object" && supplied !== null ? Object.keys(supplied) : [];

  const knownKeys = Object.keys(inputSchema.shape);
  const warnings = inputKeys
    .filter((key) => !knownKeys.includes(key))
    .map(
      (key) =>
        `Unknown field '${key}' is not part of '${toolName}' schema — possible typo? Known fields: ${knownKeys.join(", ") || "(none)"}`,
    );

  // Not .strict(): unknown fields are reported as warnings above, not errors.
  const result = inputSchema.safeParse(supplied);
  if (result.success) {
    return { valid: true, data: result.data, warnings };
  }

  const errors = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
  return { valid: false, errors, warnings };
}

/**
 * Erases a tool's argument type behind validation so it can join the registry.
 */
export function defineTool<S extends z.ZodObject>(spec: ToolSpec<S>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.inputSchema,
    async run(rawArgs, ctx) {
      const validation = validateToolArgs(spec.name, spec.inputSchema, rawArgs);
      for (const warning of validation.warnings) {
        logger.warn(warning);
      }
      if (!validation.valid) {
        return fail(
          "INVALID_ARGUMENTS",
          `Invalid arguments for ${spec.name}: ${validation.errors.join("; ")}`,
        );
      }
      return spec.impl(validation.data, ctx);
    },
  };
}
