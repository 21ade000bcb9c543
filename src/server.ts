#!/usr/bin/env node
/**
 * @file server
 * @description Process entrypoint: loads configuration once, wires the OCI
 * backends into the tool handlers and serves them over Streamable HTTP
 * (default) or stdio.
 */

import * as env from "./env.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { startHttpServer, type RunningHttpServer } from "./http-server.js";
import { createMcpServerInstance } from "./mcp-server.js";
import { createAuthProvider, OciClientFactory, readProfileDefaults } from "./oci/clients.js";
import { OciComputeBackend } from "./oci/compute-backend.js";
import { OciIdentityBackend } from "./oci/identity-backend.js";
import { ToolHandlers } from "./tools/tool-handlers.js";
import { logger } from "./utils/logger.js";

function shutdownOn(signals: NodeJS.Signals[], close: () => Promise<void>): void {
  for (const signal of signals) {
    process.once(signal, () => {
      logger.info(`[MCP] ${signal} received, shutting down`);
      close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error("[MCP] Shutdown failed", error);
          process.exit(1);
        },
      );
    });
  }
}

async function main(): Promise<void> {
  const provider = createAuthProvider(env.OCI_CONFIG_FILE, env.PROFILE_NAME);
  const config = loadConfig(readProfileDefaults(provider));
  logger.info("[MCP] Configuration loaded", {
    profile: config.profileName,
    tenancyId: config.tenancyId,
    regionId: config.regionId,
  });

  const clients = new OciClientFactory(provider, config.regionId);
  const toolHandlers = ToolHandlers.create(config, {
    compute: new OciComputeBackend(clients.compute),
    identity: new OciIdentityBackend(clients.identity),
  });

  if (env.MCP_TRANSPORT === "http") {
    const running: RunningHttpServer = await startHttpServer(toolHandlers, {
      host: env.MCP_HOST,
      port: env.MCP_PORT,
      serverName: config.serverName,
    });
    shutdownOn(["SIGINT", "SIGTERM"], () => running.close());
    return;
  }

  const mcpServer = createMcpServerInstance(toolHandlers, config.serverName);
  await mcpServer.connect(new StdioServerTransport());
  shutdownOn(["SIGINT", "SIGTERM"], () => mcpServer.close());

  logger.info("[MCP] Server started on stdio transport");
  logger.info(`[MCP] Available tools: ${toolHandlers.toolNames.join(", ")}`);
}

main().catch((error: unknown) => {
  logger.error("[MCP] Fatal error", error);
  process.exit(1);
});
