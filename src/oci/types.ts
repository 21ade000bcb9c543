/**
 * @file oci/types
 * @description Records and backend contracts shared by the OCI adapters, the
 * engines and the tool handlers.
 * @remarks The record shapes are the subset of the `oci-sdk` models this
 * server reads, so SDK responses are assignable to them without mapping.
 */

import type { InstanceAction } from "../utils/validation.js";

/** Compute instance as returned by `ComputeClient.getInstance` / `listInstances`. */
export interface ComputeInstance {
  id: string;
  displayName?: string;
  lifecycleState: string;
  availabilityDomain: string;
  shape: string;
  timeCreated: Date | string;
  compartmentId: string;
  region: string;
  faultDomain?: string;
  imageId?: string;
  launchMode?: string;
  shapeConfig?: {
    ocpus?: number;
    memoryInGBs?: number;
  };
  launchOptions?: {
    bootVolumeType?: string;
    firmware?: string;
    networkType?: string;
  };
  metadata?: Record<string, string>;
  extendedMetadata?: Record<string, unknown>;
}

/** Compartment as returned by `IdentityClient.listCompartments` / `getCompartment`. */
export interface Compartment {
  id: string;
  name: string;
  description: string;
  lifecycleState?: string;
  timeCreated: Date | string;
}

/** One page of a paginated listing; `nextPage` is the opaque continuation token. */
export interface Page<T> {
  items: T[];
  nextPage?: string;
}

/**
 * Compute operations the tools and the lifecycle coordinator depend on.
 * `region` selects the regional endpoint; omitted means the configured region.
 */
export interface ComputeBackend {
  getInstance(instanceId: string, region?: string): Promise<ComputeInstance>;
  /** Every instance in the compartment, all pages followed. */
  listInstances(compartmentId: string, region?: string): Promise<ComputeInstance[]>;
  /** Requests a lifecycle transition; resolves once accepted, not once completed. */
  instanceAction(instanceId: string, region: string, action: InstanceAction): Promise<void>;
}

/** Identity operations used for compartment resolution. */
export interface IdentityBackend {
  /** One page of the ACTIVE, ACCESSIBLE compartments in the subtree of `rootId`. */
  listCompartments(rootId: string, page?: string): Promise<Page<Compartment>>;
  getCompartment(compartmentId: string): Promise<Compartment>;
}
