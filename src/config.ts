/**
 * Configuration loader
 *
 * Builds the immutable `ServerConfig` once at process start. Tool handlers
 * receive it through their context and never read the environment themselves.
 */

import * as env from "./env.js";

export interface ServerConfig {
  readonly serverName: string;
  readonly profileName: string;
  readonly configFile: string;
  readonly tenancyId: string;
  readonly regionId: string;
}

/** Values taken from the OCI config-file profile. */
export interface ProfileDefaults {
  tenancyId?: string;
  regionId?: string;
}

/** Environment-derived inputs; defaults come from `env.ts`. */
export interface ConfigSources {
  serverName: string;
  profileName: string;
  configFile: string;
  tenancyOverride?: string;
  regionOverride?: string;
}

export function environmentSources(): ConfigSources {
  return {
    serverName: env.OCI_COMPUTE_SERVER_NAME,
    profileName: env.PROFILE_NAME,
    configFile: env.OCI_CONFIG_FILE,
    tenancyOverride: env.TENANCY_ID_OVERRIDE,
    regionOverride: env.REGION_ID_OVERRIDE,
  };
}

/**
 * Overrides win over the profile. Throws when neither supplies a tenancy or a
 * region, since no tool can run without both.
 */
export function loadConfig(
  profile: ProfileDefaults,
  sources: ConfigSources = environmentSources(),
): ServerConfig {
  const tenancyId = sources.tenancyOverride || profile.tenancyId;
  const regionId = sources.regionOverride || profile.regionId;

  if (!tenancyId) {
    throw new Error(
      `No tenancy configured: set TENANCY_ID_OVERRIDE or add 'tenancy' to profile ${sources.profileName}`,
    );
  }
  if (!regionId) {
    throw new Error(
      `No region configured: set REGION_ID_OVERRIDE or add 'region' to profile ${sources.profileName}`,
    );
  }

  return Object.freeze({
    serverName: sources.serverName,
    profileName: sources.profileName,
    configFile: sources.configFile,
    tenancyId,
    regionId,
  });
}
