/**
 * ComputeBackend over the `oci-sdk` ComputeClient.
 */

import type { InstanceAction } from "../utils/validation.js";
import { logger } from "../utils/logger.js";
import { collectPages } from "./pagination.js";
import type { ComputeBackend, ComputeInstance } from "./types.js";

/**
 * The `ComputeClient` methods this backend calls. `oci.core.ComputeClient`
 * satisfies it structurally; tests pass plain objects.
 */
export interface ComputeApi {
  getInstance(request: { instanceId: string }): Promise<{ instance: ComputeInstance }>;
  listInstances(request: {
    compartmentId: string;
    page?: string;
  }): Promise<{ items: ComputeInstance[]; opcNextPage?: string }>;
  instanceAction(request: { instanceId: string; action: string }): Promise<{
    instance: ComputeInstance;
  }>;
}

/** Builds a client bound to `region`, or to the configured region when omitted. */
export type ComputeApiFactory = (region?: string) => ComputeApi;

export class OciComputeBackend implements ComputeBackend {
  constructor(private readonly clientFor: ComputeApiFactory) {}

  async getInstance(instanceId: string, region?: string): Promise<ComputeInstance> {
    const { instance } = await this.clientFor(region).getInstance({ instanceId });
    return instance;
  }

  async listInstances(compartmentId: string, region?: string): Promise<ComputeInstance[]> {
    const client = this.clientFor(region);
    const instances = await collectPages(async (page) => {
      const response = await client.listInstances({ compartmentId, page });
      return { items: response.items, nextPage: response.opcNextPage };
    });
    logger.debug("Listed compute instances", { compartmentId, region, count: instances.length });
    return instances;
  }

  async instanceAction(instanceId: string, region: string, action: InstanceAction): Promise<void> {
    const { instance } = await this.clientFor(region).instanceAction({ instanceId, action });
    logger.info("Instance action accepted", {
      instanceId,
      region,
      action,
      lifecycleState: instance.lifecycleState,
    });
  }
}
