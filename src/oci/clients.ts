/**
 * OCI SDK authentication and client construction.
 *
 * The auth provider reads the config-file profile once at startup; clients are
 * built per invocation so a regional call never shares endpoint state with
 * another.
 */

import * as oci from "oci-sdk";
import { logger } from "../utils/logger.js";
import type { ProfileDefaults } from "../config.js";
import type { ComputeApi } from "./compute-backend.js";
import type { IdentityApi } from "./identity-backend.js";

/**
 * Loads credentials from `profile` in the OCI config file. Throws when the file
 * or profile does not exist.
 */
export function createAuthProvider(
  configFile: string,
  profile: string,
): oci.common.ConfigFileAuthenticationDetailsProvider {
  logger.info("Using config file authentication", { profile, configFile });
  return new oci.common.ConfigFileAuthenticationDetailsProvider(configFile, profile);
}

/** Tenancy and region recorded in the loaded profile. */
export function readProfileDefaults(
  provider: oci.common.ConfigFileAuthenticationDetailsProvider,
): ProfileDefaults {
  return {
    tenancyId: provider.getTenantId(),
    regionId: provider.getRegion()?.regionId,
  };
}

/**
 * Accepts both full region identifiers (`us-ashburn-1`) and the short keys
 * embedded in OCIDs (`iad`).
 */
export function toRegionId(region: string): string {
  return oci.common.Region.getRegionIdFromShortCode(region);
}

export class OciClientFactory {
  constructor(
    private readonly provider: oci.common.AuthenticationDetailsProvider,
    private readonly defaultRegion: string,
  ) {}

  /** Region id a client for `region` targets; the configured region when omitted. */
  regionFor(region?: string): string {
    return toRegionId(region ?? this.defaultRegion);
  }

  readonly compute = (region?: string): ComputeApi => {
    const client = new oci.core.ComputeClient({ authenticationDetailsProvider: this.provider });
    client.regionId = this.regionFor(region);
    return client;
  };

  readonly identity = (): IdentityApi => {
    const client = new oci.identity.IdentityClient({
      authenticationDetailsProvider: this.provider,
    });
    client.regionId = this.regionFor();
    return client;
  };
}
