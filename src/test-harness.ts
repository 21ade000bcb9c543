/**
 * @file test-harness
 * @description In-process stand-ins for the OCI backends and fixture builders
 * shared by the test suites.
 */

import { vi } from "vitest";
import type { ServerConfig } from "./config.js";
import type { Compartment, ComputeBackend, ComputeInstance, IdentityBackend } from "./oci/types.js";
import { ToolHandlers } from "./tools/tool-handlers.js";

export const TEST_TENANCY_ID = "ocid1.tenancy.oc1..tenancytest";

export const testConfig: ServerConfig = {
  serverName: "oci-compute-test",
  profileName: "DEFAULT",
  configFile: "/tmp/oci-test-config",
  tenancyId: TEST_TENANCY_ID,
  regionId: "us-ashburn-1",
};

export function makeInstance(overrides: Partial<ComputeInstance> = {}): ComputeInstance {
  return {
    id: "ocid1.instance.oc1.iad.abc123",
    displayName: "web-01",
    lifecycleState: "RUNNING",
    availabilityDomain: "Uocm:US-ASHBURN-AD-1",
    shape: "VM.Standard.E4.Flex",
    timeCreated: new Date("2025-03-01T10:00:00.000Z"),
    compartmentId: "ocid1.compartment.oc1..apps",
    region: "iad",
    ...overrides,
  };
}

export function makeCompartment(overrides: Partial<Compartment> = {}): Compartment {
  return {
    id: "ocid1.compartment.oc1..apps",
    name: "apps",
    description: "Application workloads",
    lifecycleState: "ACTIVE",
    timeCreated: new Date("2024-01-15T08:30:00.000Z"),
    ...overrides,
  };
}

export function makeComputeBackend() {
  return {
    getInstance: vi.fn<ComputeBackend["getInstance"]>(),
    listInstances: vi.fn<ComputeBackend["listInstances"]>(),
    instanceAction: vi.fn<ComputeBackend["instanceAction"]>().mockResolvedValue(undefined),
  } satisfies ComputeBackend;
}

/**
 * Identity backend serving `pages` in order, then `root` for the tenancy.
 */
export function makeIdentityBackend(pages: Compartment[][], root: Compartment) {
  return {
    listCompartments: vi.fn<IdentityBackend["listCompartments"]>(async (_rootId, page) => {
      const index = page === undefined ? 0 : Number(page.replace("page-", ""));
      const items = pages[index] ?? [];
      const nextPage = index + 1 < pages.length ? `page-${index + 1}` : undefined;
      return { items, nextPage };
    }),
    getCompartment: vi.fn<IdentityBackend["getCompartment"]>().mockResolvedValue(root),
  } satisfies IdentityBackend;
}

export const rootCompartment = makeCompartment({
  id: TEST_TENANCY_ID,
  name: "acme-tenancy",
  description: "Root compartment",
});

export function makeHandlers(
  options: {
    compute?: ReturnType<typeof makeComputeBackend>;
    identity?: ReturnType<typeof makeIdentityBackend>;
  } = {},
) {
  const compute = options.compute ?? makeComputeBackend();
  const identity = options.identity ?? makeIdentityBackend([[makeCompartment()]], rootCompartment);
  const handlers = ToolHandlers.create(testConfig, { compute, identity });
  return { handlers, compute, identity };
}

/** Parses tool output text, failing loudly when it is not JSON. */
export function parseOutput(text: string): unknown {
  return JSON.parse(text);
}
