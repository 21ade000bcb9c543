/**
 * Compartment lookups over the tenancy subtree.
 */

import { collectPages } from "../oci/pagination.js";
import type { Compartment, IdentityBackend } from "../oci/types.js";
import { equalsIgnoreCase } from "../utils/validation.js";

export class CompartmentDirectory {
  constructor(
    private readonly identity: IdentityBackend,
    private readonly tenancyId: string,
  ) {}

  /**
   * Every active, accessible compartment under the tenancy, followed by the
   * tenancy (root compartment) itself.
   */
  async listAll(): Promise<Compartment[]> {
    const subtree = await collectPages((page) =>
      this.identity.listCompartments(this.tenancyId, page),
    );
    const root = await this.identity.getCompartment(this.tenancyId);
    return [...subtree, root];
  }

  /** First compartment whose name matches case-insensitively. */
  async findByName(name: string): Promise<Compartment | undefined> {
    const compartments = await this.listAll();
    return compartments.find((compartment) => equalsIgnoreCase(compartment.name, name));
  }
}
