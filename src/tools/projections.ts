/**
 * @file tools/projections
 * @description Reshapes SDK records into the snake_case JSON objects the tools return.
 * @remarks Optional fields the backend did not send are rendered as `null` so
 * every object of a kind carries the same keys.
 */

import type { Compartment, ComputeInstance } from "../oci/types.js";

export interface CompartmentView {
  id: string;
  name: string;
  description: string;
  lifecycle_state: string | null;
  time_created: string;
}

export interface InstanceSummaryView {
  id: string;
  display_name: string | null;
  lifecycle_state: string;
  availability_domain: string;
  shape: string;
  time_created: string;
  compartment_id: string;
}

export interface InstanceDetailView extends InstanceSummaryView {
  shape_config: { ocpus: number | null; memory_in_gbs: number | null } | null;
  region: string;
  fault_domain: string | null;
  image_id: string | null;
  launch_mode: string | null;
  launch_options: {
    boot_volume_type: string | null;
    firmware: string | null;
    network_type: string | null;
  } | null;
  metadata: Record<string, string> | null;
  extended_metadata: Record<string, unknown> | null;
}

/** ISO-8601 for `Date`; strings the SDK left undecoded pass through. */
export function formatTimestamp(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : value;
}

export function toCompartmentView(compartment: Compartment): CompartmentView {
  return {
    id: compartment.id,
    name: compartment.name,
    description: compartment.description,
    lifecycle_state: compartment.lifecycleState ?? null,
    time_created: formatTimestamp(compartment.timeCreated),
  };
}

export function toInstanceSummary(instance: ComputeInstance): InstanceSummaryView {
  return {
    id: instance.id,
    display_name: instance.displayName ?? null,
    lifecycle_state: instance.lifecycleState,
    availability_domain: instance.availabilityDomain,
    shape: instance.shape,
    time_created: formatTimestamp(instance.timeCreated),
    compartment_id: instance.compartmentId,
  };
}

export function toInstanceDetail(instance: ComputeInstance): InstanceDetailView {
  const { shapeConfig, launchOptions } = instance;
  return {
    ...toInstanceSummary(instance),
    shape_config: shapeConfig
      ? {
          ocpus: shapeConfig.ocpus ?? null,
          memory_in_gbs: shapeConfig.memoryInGBs ?? null,
        }
      : null,
    region: instance.region,
    fault_domain: instance.faultDomain ?? null,
    image_id: instance.imageId ?? null,
    launch_mode: instance.launchMode ?? null,
    launch_options: launchOptions
      ? {
          boot_volume_type: launchOptions.bootVolumeType ?? null,
          firmware: launchOptions.firmware ?? null,
          network_type: launchOptions.networkType ?? null,
        }
      : null,
    metadata: instance.metadata ?? null,
    extended_metadata: instance.extendedMetadata ?? null,
  };
}
