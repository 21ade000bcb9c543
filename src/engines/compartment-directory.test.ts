import { describe, expect, it } from "vitest";
import {
  makeCompartment,
  makeIdentityBackend,
  rootCompartment,
  TEST_TENANCY_ID,
} from "../test-harness.js";
import { CompartmentDirectory } from "./compartment-directory.js";

const apps = makeCompartment({ id: "ocid1.compartment.oc1..apps", name: "Apps" });
const data = makeCompartment({ id: "ocid1.compartment.oc1..data", name: "data" });
const network = makeCompartment({ id: "ocid1.compartment.oc1..net", name: "network" });

describe("CompartmentDirectory", () => {
  it("follows every page and appends the root compartment last", async () => {
    const identity = makeIdentityBackend([[apps, data], [network]], rootCompartment);
    const directory = new CompartmentDirectory(identity, TEST_TENANCY_ID);

    const compartments = await directory.listAll();

    expect(compartments.map((c) => c.name)).toEqual(["Apps", "data", "network", "acme-tenancy"]);
    expect(identity.listCompartments.mock.calls).toEqual([
      [TEST_TENANCY_ID, undefined],
      [TEST_TENANCY_ID, "page-1"],
    ]);
    expect(identity.getCompartment).toHaveBeenCalledWith(TEST_TENANCY_ID);
  });

  it("returns only the root when the tenancy has no child compartments", async () => {
    const identity = makeIdentityBackend([[]], rootCompartment);

    const compartments = await new CompartmentDirectory(identity, TEST_TENANCY_ID).listAll();

    expect(compartments).toEqual([rootCompartment]);
  });

  it("finds compartments by case-insensitive name, the root included", async () => {
    const identity = makeIdentityBackend([[apps, data]], rootCompartment);
    const directory = new CompartmentDirectory(identity, TEST_TENANCY_ID);

    await expect(directory.findByName("apps")).resolves.toBe(apps);
    await expect(directory.findByName("DATA")).resolves.toBe(data);
    await expect(directory.findByName("ACME-Tenancy")).resolves.toBe(rootCompartment);
    await expect(directory.findByName("missing")).resolves.toBeUndefined();
  });

  it("propagates backend failures", async () => {
    const identity = makeIdentityBackend([[apps]], rootCompartment);
    identity.getCompartment.mockRejectedValue(new Error("NotAuthenticated"));

    await expect(new CompartmentDirectory(identity, TEST_TENANCY_ID).listAll()).rejects.toThrow(
      "NotAuthenticated",
    );
  });
});
