/**
 * Input validation for instance identifiers and lifecycle actions.
 */

import { fail, succeed, type ToolResult } from "./errors.js";

export const INSTANCE_ACTIONS = ["START", "STOP", "RESET"] as const;

export type InstanceAction = (typeof INSTANCE_ACTIONS)[number];

export function isInstanceAction(value: string): value is InstanceAction {
  return (INSTANCE_ACTIONS as readonly string[]).includes(value);
}

/**
 * Upper-cases `raw` and checks it against the supported lifecycle actions.
 */
export function normalizeAction(raw: string): ToolResult<InstanceAction> {
  const action = raw.toUpperCase();
  if (!isInstanceAction(action)) {
    return fail(
      "INVALID_ACTION",
      `Invalid action '${action}'. Valid actions are: ${INSTANCE_ACTIONS.join(", ")}`,
    );
  }
  return succeed(action);
}

/**
 * Reads the region key embedded in an OCID.
 *
 * OCIDs look like `ocid1.<resource>.<realm>.<region>.<unique>`, so the region
 * is the 4th dot-separated segment (`ocid1.instance.oc1.iad.abc` → `iad`).
 */
export function regionFromInstanceId(instanceId: string): ToolResult<string> {
  const region = instanceId.split(".")[3];
  if (!region) {
    return fail("INVALID_IDENTIFIER_FORMAT", "Invalid instance_id format. Cannot extract region.");
  }
  return succeed(region);
}

/**
 * Uses `region` when one was given, otherwise infers it from the OCID.
 * An empty string counts as not given.
 */
export function resolveInstanceRegion(instanceId: string, region?: string): ToolResult<string> {
  return region ? succeed(region) : regionFromInstanceId(instanceId);
}

/** Case-insensitive equality used for compartment and display-name lookups. */
export function equalsIgnoreCase(left: string, right: string): boolean {
  return left.toLowerCase() === right.toLowerCase();
}
