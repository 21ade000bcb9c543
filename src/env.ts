/**
 * Centralized environment configuration.
 *
 * This is the ONLY place in the codebase that reads `process.env`.
 * Every other module imports the constants it needs from here, and
 * `loadConfig()` folds the OCI-related ones into a `ServerConfig` at startup.
 *
 * Copy `.env.example` to `.env` and adjust the values for your setup.
 */

import * as dotenv from "dotenv";
import * as os from "node:os";
import * as path from "node:path";

// Load .env file as early as possible so all subsequent reads see the values.
dotenv.config();

// ── OCI credentials ───────────────────────────────────────────────────────────

/**
 * Profile section of the OCI config file used for credentials, tenancy and region.
 * Env: PROFILE_NAME
 * Default: "DEFAULT"
 */
export const PROFILE_NAME: string = process.env.PROFILE_NAME || "DEFAULT";

/**
 * Path of the OCI config file.
 * Env: OCI_CONFIG_FILE
 * Default: ~/.oci/config
 */
export const OCI_CONFIG_FILE: string =
  process.env.OCI_CONFIG_FILE || path.join(os.homedir(), ".oci", "config");

/**
 * Tenancy OCID used instead of the profile's `tenancy` entry.
 * Env: TENANCY_ID_OVERRIDE
 */
export const TENANCY_ID_OVERRIDE: string | undefined =
  process.env.TENANCY_ID_OVERRIDE || undefined;

/**
 * Region identifier used instead of the profile's `region` entry.
 * Env: REGION_ID_OVERRIDE
 */
export const REGION_ID_OVERRIDE: string | undefined =
  process.env.REGION_ID_OVERRIDE || undefined;

// ── MCP Transport ─────────────────────────────────────────────────────────────

/**
 * Transport mode for the MCP server.
 * Env: MCP_TRANSPORT
 * Default: "http" (Streamable HTTP)
 */
export const MCP_TRANSPORT: "stdio" | "http" =
  process.env.MCP_TRANSPORT === "stdio" ? "stdio" : "http";

/**
 * Interface the HTTP transport binds to.
 * Env: MCP_HOST
 * Default: "0.0.0.0"
 */
export const MCP_HOST: string = process.env.MCP_HOST || "0.0.0.0";

/**
 * HTTP port when MCP_TRANSPORT=http.
 * Env: MCP_PORT
 * Default: 8000
 */
export const MCP_PORT: number = parseInt(process.env.MCP_PORT || "8000", 10);

/**
 * Display name reported by the MCP server.
 * Env: OCI_COMPUTE_SERVER_NAME
 * Default: "oci-compute"
 */
export const OCI_COMPUTE_SERVER_NAME: string =
  process.env.OCI_COMPUTE_SERVER_NAME || "oci-compute";

// ── Logging ───────────────────────────────────────────────────────────────────

/**
 * Minimum level written by the structured logger (debug, info, warn, error).
 * Env: OCI_COMPUTE_LOG_LEVEL
 * Default: "info"
 */
export const OCI_COMPUTE_LOG_LEVEL: string = (
  process.env.OCI_COMPUTE_LOG_LEVEL ?? "info"
).toLowerCase();
