/**
 * @file http-server
 * @description Streamable HTTP transport with one MCP server per session.
 * `DELETE` with the session header ends a session.
 */

import { randomUUID } from "node:crypto";
import type { Server } from "node:http";
import type { Request, Response } from "express";
import type { Server as McpProtocolServer } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createMcpExpressApp } from "@modelcontextprotocol/sdk/server/express.js";
import { createMcpServerInstance } from "./mcp-server.js";
import { runWithRequestContext } from "./request-context.js";
import type { ToolHandlers } from "./tools/tool-handlers.js";
import { describeError } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

interface SessionState {
  server: McpProtocolServer;
  transport: StreamableHTTPServerTransport;
}

export interface HttpServerOptions {
  host: string;
  port: number;
  serverName: string;
}

export interface RunningHttpServer {
  /** Port actually bound; differs from the requested one when that was 0. */
  readonly port: number;
  readonly openSessions: number;
  /** Closes every open MCP session, then the listener. */
  close(): Promise<void>;
}

function headerSessionId(req: Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return Array.isArray(header) ? header[0] : header;
}

function isInitializeRequest(body: unknown): boolean {
  return (
    typeof body === "object" && body !== null && "method" in body && body.method === "initialize"
  );
}

export function startHttpServer(
  toolHandlers: ToolHandlers,
  options: HttpServerOptions,
): Promise<RunningHttpServer> {
  const app = createMcpExpressApp({ host: options.host });
  const sessions = new Map<string, SessionState>();

  const openSession = async (req: Request, res: Response): Promise<void> => {
    const sessionServer = createMcpServerInstance(toolHandlers, options.serverName);
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId: string) => {
        sessions.set(newSessionId, { server: sessionServer, transport });
        logger.info("[MCP] Session opened", { sessionId: newSessionId });
      },
    });

    transport.onclose = () => {
      const closedSessionId = transport.sessionId;
      if (!closedSessionId) return;

      const existing = sessions.get(closedSessionId);
      if (existing?.transport === transport) {
        sessions.delete(closedSessionId);
        existing.server.close().catch((closeError: unknown) => {
          logger.warn("[MCP] Failed to close session server after transport close", closeError);
        });
      }
    };

    await sessionServer.connect(transport);
    await runWithRequestContext({ sessionId: transport.sessionId }, () =>
      transport.handleRequest(req, res, req.body),
    );
  };

  const handleMcpRequest = async (req: Request, res: Response): Promise<void> => {
    try {
      if (isInitializeRequest(req.body)) {
        await openSession(req, res);
        return;
      }

      const sessionId = headerSessionId(req);
      const sessionState = sessionId ? sessions.get(sessionId) : undefined;
      if (!sessionId || !sessionState) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: Invalid or missing MCP session" },
          id: null,
        });
        return;
      }

      await runWithRequestContext({ sessionId }, () =>
        sessionState.transport.handleRequest(req, res, req.body),
      );
    } catch (error: unknown) {
      logger.error("[MCP] HTTP transport error", error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: describeError(error) || "Internal server error" },
          id: null,
        });
      }
    }
  };

  for (const route of ["/", "/mcp"]) {
    app.post(route, (req, res) => {
      void handleMcpRequest(req, res);
    });
    app.delete(route, (req, res) => {
      void handleMcpRequest(req, res);
    });
  }

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", transport: "http" });
  });

  return new Promise<RunningHttpServer>((resolve, reject) => {
    const listener: Server = app.listen(options.port, options.host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      const address = listener.address();
      const port = typeof address === "object" && address !== null ? address.port : options.port;
      logger.info(`[MCP] Server started on HTTP transport (${options.host}:${port})`);
      logger.info("[MCP] Endpoints: POST|DELETE / and /mcp, GET /health");
      logger.info(`[MCP] Available tools: ${toolHandlers.toolNames.join(", ")}`);

      resolve({
        port,
        get openSessions() {
          return sessions.size;
        },
        async close() {
          const open = [...sessions.values()];
          sessions.clear();
          for (const { server } of open) {
            await server.close();
          }
          await new Promise<void>((closed, failed) => {
            listener.close((closeError) => (closeError ? failed(closeError) : closed()));
          });
        },
      });
    });
    listener.once("error", reject);
  });
}
