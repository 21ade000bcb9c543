/**
 * Lifecycle Action Coordinator
 *
 * Turns a START / STOP / RESET request into zero, one or two instance actions,
 * based on the lifecycle state read from the backend right before deciding.
 *
 * | observed | START           | STOP            | RESET                  |
 * |----------|-----------------|-----------------|------------------------|
 * | STOPPED  | START           | -               | START                  |
 * | RUNNING  | -               | STOP            | STOP, then START       |
 * | other    | -               | -               | - ("Cannot reset")     |
 *
 * RESET on a running instance sends START as soon as STOP has been accepted;
 * it does not wait for the instance to reach STOPPED. A failed START after an
 * accepted STOP is reported as a failure of the whole action.
 */

import type { ComputeBackend } from "../oci/types.js";
import { attempt, type ToolResult } from "../utils/errors.js";
import {
  normalizeAction,
  resolveInstanceRegion,
  type InstanceAction,
} from "../utils/validation.js";

export type ActionStatus = "Action initiated" | "No action needed" | "Cannot reset";

export interface ActionRequest {
  instanceId: string;
  /** Case-insensitive START, STOP or RESET. */
  action: string;
  /** Region identifier; inferred from the OCID when omitted. */
  region?: string;
}

export interface ActionResult {
  instance_id: string;
  instance_name: string | null;
  action_requested: InstanceAction;
  previous_state: string;
  status: ActionStatus;
  message: string;
}

/** What to send for one `(state, action)` pair, before anything is sent. */
export interface LifecyclePlan {
  dispatch: Array<"START" | "STOP">;
  status: ActionStatus;
  message: string;
}

export function planLifecycleAction(state: string, action: InstanceAction): LifecyclePlan {
  const alreadyThere: LifecyclePlan = {
    dispatch: [],
    status: "No action needed",
    message: `Instance is already in state: ${state}`,
  };

  switch (action) {
    case "START":
      return state === "STOPPED"
        ? { dispatch: ["START"], status: "Action initiated", message: "Instance start initiated" }
        : alreadyThere;
    case "STOP":
      return state === "RUNNING"
        ? { dispatch: ["STOP"], status: "Action initiated", message: "Instance stop initiated" }
        : alreadyThere;
    case "RESET":
      if (state === "RUNNING") {
        return {
          dispatch: ["STOP", "START"],
          status: "Action initiated",
          message: "Instance reset initiated (stop then start)",
        };
      }
      if (state === "STOPPED") {
        return {
          dispatch: ["START"],
          status: "Action initiated",
          message: "Instance start initiated (was already stopped)",
        };
      }
      return {
        dispatch: [],
        status: "Cannot reset",
        message: `Cannot reset instance in state: ${state}`,
      };
  }
}

export class LifecycleCoordinator {
  constructor(private readonly compute: ComputeBackend) {}

  async perform(request: ActionRequest): Promise<ToolResult<ActionResult>> {
    const region = resolveInstanceRegion(request.instanceId, request.region);
    if (!region.ok) return region;

    const action = normalizeAction(request.action);
    if (!action.ok) return action;

    return attempt(async () => {
      const instance = await this.compute.getInstance(request.instanceId, region.value);
      const plan = planLifecycleAction(instance.lifecycleState, action.value);

      for (const step of plan.dispatch) {
        await this.compute.instanceAction(request.instanceId, region.value, step);
      }

      return {
        instance_id: request.instanceId,
        instance_name: instance.displayName ?? null,
        action_requested: action.value,
        previous_state: instance.lifecycleState,
        status: plan.status,
        message: plan.message,
      };
    }, "Failed to perform instance action");
  }
}
