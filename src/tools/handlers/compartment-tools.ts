/**
 * Compartment Tools
 *
 * Tools:
 * - list_compartments: every compartment in the tenancy, root included
 * - get_compartment_by_name: one compartment by case-insensitive name
 */

import * as z from "zod";
import type { Compartment } from "../../oci/types.js";
import { attempt, fail, succeed, type ToolResult } from "../../utils/errors.js";
import { defineTool } from "../contract-validator.js";
import { toCompartmentView } from "../projections.js";
import type { ToolContext } from "../types.js";

/**
 * Looks a compartment up by name. Backend failures carry `failurePrefix`; a
 * miss is `NOT_FOUND` pointing the caller at `list_compartments`.
 */
export async function resolveCompartment(
  ctx: ToolContext,
  compartmentName: string,
  failurePrefix: string,
): Promise<ToolResult<Compartment>> {
  const found = await attempt(() => ctx.compartments.findByName(compartmentName), failurePrefix);
  if (!found.ok) return found;
  if (!found.value) {
    return fail(
      "NOT_FOUND",
      `Compartment '${compartmentName}' not found. Use list_compartments() to see available compartments.`,
    );
  }
  return succeed(found.value);
}

export const compartmentToolDefinitions = [
  defineTool({
    name: "list_compartments",
    description: "List all compartments in the tenancy with pagination support",
    inputSchema: z.object({}),
    async impl(_args, ctx) {
      const compartments = await attempt(
        () => ctx.compartments.listAll(),
        "Failed to list compartments",
      );
      if (!compartments.ok) return compartments;
      return succeed(compartments.value.map(toCompartmentView));
    },
  }),
  defineTool({
    name: "get_compartment_by_name",
    description: "Get a compartment by its name (case-insensitive)",
    inputSchema: z.object({
      compartment_name: z.string().describe("Compartment name"),
    }),
    async impl(args, ctx) {
      const compartment = await resolveCompartment(
        ctx,
        args.compartment_name,
        "Failed to get compartment by name",
      );
      if (!compartment.ok) return compartment;
      return succeed(toCompartmentView(compartment.value));
    },
  }),
];
