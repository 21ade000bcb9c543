/**
 * IdentityBackend over the `oci-sdk` IdentityClient.
 */

import type { Compartment, IdentityBackend, Page } from "./types.js";

/**
 * The `IdentityClient` methods this backend calls. `oci.identity.IdentityClient`
 * satisfies it structurally; tests pass plain objects.
 */
export interface IdentityApi {
  listCompartments(request: {
    compartmentId: string;
    compartmentIdInSubtree?: boolean;
    accessLevel?: string;
    lifecycleState?: string;
    page?: string;
  }): Promise<{ items: Compartment[]; opcNextPage?: string }>;
  getCompartment(request: { compartmentId: string }): Promise<{ compartment: Compartment }>;
}

export type IdentityApiFactory = () => IdentityApi;

export class OciIdentityBackend implements IdentityBackend {
  constructor(private readonly clientFor: IdentityApiFactory) {}

  async listCompartments(rootId: string, page?: string): Promise<Page<Compartment>> {
    const response = await this.clientFor().listCompartments({
      compartmentId: rootId,
      compartmentIdInSubtree: true,
      accessLevel: "ACCESSIBLE",
      lifecycleState: "ACTIVE",
      page,
    });
    return { items: response.items, nextPage: response.opcNextPage };
  }

  async getCompartment(compartmentId: string): Promise<Compartment> {
    const { compartment } = await this.clientFor().getCompartment({ compartmentId });
    return compartment;
  }
}
