/**
 * Compute Instance Tools
 *
 * Tools:
 * - list_compute_instances: instances in a compartment, by compartment name
 * - get_compute_instance: one instance by OCID
 * - get_compute_instance_by_name: one instance by display name within a compartment
 * - compute_instance_action: START / STOP / RESET through the lifecycle coordinator
 */

import * as z from "zod";
import { attempt, fail, succeed, type ToolResult } from "../../utils/errors.js";
import { equalsIgnoreCase } from "../../utils/validation.js";
import { defineTool } from "../contract-validator.js";
import { toInstanceDetail, toInstanceSummary, type InstanceDetailView } from "../projections.js";
import type { ToolContext } from "../types.js";
import { resolveCompartment } from "./compartment-tools.js";

const regionSchema = z
  .string()
  .optional()
  .describe("Region identifier (e.g. us-ashburn-1); defaults to the configured region");

async function fetchInstanceDetail(
  ctx: ToolContext,
  instanceId: string,
  region: string | undefined,
): Promise<ToolResult<InstanceDetailView>> {
  const instance = await attempt(
    () => ctx.compute.getInstance(instanceId, region || undefined),
    "Failed to get compute instance",
  );
  if (!instance.ok) return instance;
  return succeed(toInstanceDetail(instance.value));
}

export const instanceToolDefinitions = [
  defineTool({
    name: "list_compute_instances",
    description: "List all compute instances in a given compartment name",
    inputSchema: z.object({
      compartment_name: z.string().describe("Compartment name"),
      region: regionSchema,
    }),
    async impl(args, ctx) {
      const failurePrefix = "Failed to list compute instances";
      const compartment = await resolveCompartment(ctx, args.compartment_name, failurePrefix);
      if (!compartment.ok) return compartment;

      const instances = await attempt(
        () => ctx.compute.listInstances(compartment.value.id, args.region || undefined),
        failurePrefix,
      );
      if (!instances.ok) return instances;
      return succeed(instances.value.map(toInstanceSummary));
    },
  }),
  defineTool({
    name: "get_compute_instance",
    description: "Get detailed information about a specific compute instance by ID",
    inputSchema: z.object({
      instance_id: z.string().describe("Instance OCID"),
      region: regionSchema,
    }),
    async impl(args, ctx) {
      return fetchInstanceDetail(ctx, args.instance_id, args.region);
    },
  }),
  defineTool({
    name: "get_compute_instance_by_name",
    description: "Get compute instance by display name within a specific compartment",
    inputSchema: z.object({
      instance_name: z.string().describe("Instance display name"),
      compartment_name: z.string().describe("Compartment name"),
      region: regionSchema,
    }),
    async impl(args, ctx) {
      const failurePrefix = "Failed to get compute instance by name";
      const compartment = await resolveCompartment(ctx, args.compartment_name, failurePrefix);
      if (!compartment.ok) return compartment;

      const instances = await attempt(
        () => ctx.compute.listInstances(compartment.value.id, args.region || undefined),
        failurePrefix,
      );
      if (!instances.ok) return instances;

      const match = instances.value.find(
        (instance) =>
          instance.displayName !== undefined &&
          equalsIgnoreCase(instance.displayName, args.instance_name),
      );
      if (!match) {
        return fail(
          "NOT_FOUND",
          `Instance '${args.instance_name}' not found in compartment '${args.compartment_name}'`,
        );
      }
      return fetchInstanceDetail(ctx, match.id, args.region);
    },
  }),
  defineTool({
    name: "compute_instance_action",
    description: "Perform lifecycle action on a compute instance. Actions: START, STOP, RESET",
    inputSchema: z.object({
      instance_id: z.string().describe("Instance OCID"),
      action: z.string().describe("START, STOP or RESET (case-insensitive)"),
      region: z
        .string()
        .optional()
        .describe("Region identifier; inferred from the instance OCID when omitted"),
    }),
    async impl(args, ctx) {
      return ctx.coordinator.perform({
        instanceId: args.instance_id,
        action: args.action,
        region: args.region,
      });
    },
  }),
];
