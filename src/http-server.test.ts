import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { startHttpServer, type RunningHttpServer } from "./http-server.js";
import { makeComputeBackend, makeHandlers, makeInstance } from "./test-harness.js";

let running: RunningHttpServer;
let compute: ReturnType<typeof makeComputeBackend>;

beforeEach(async () => {
  compute = makeComputeBackend();
  const { handlers } = makeHandlers({ compute });
  running = await startHttpServer(handlers, {
    host: "127.0.0.1",
    port: 0,
    serverName: "oci-compute-test",
  });
});

afterEach(async () => {
  await running.close();
});

function endpoint(path: string): string {
  return `http://127.0.0.1:${running.port}${path}`;
}

describe("startHttpServer", () => {
  it("binds an ephemeral port", () => {
    expect(running.port).toBeGreaterThan(0);
  });

  it("answers the health check", async () => {
    const response = await fetch(endpoint("/health"));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok", transport: "http" });
  });

  it("rejects requests without a session", async () => {
    const response = await fetch(endpoint("/mcp"), {
      method: "POST",
      headers: { "content-type": "application/json", accept: "application/json, text/event-stream" },
      body: JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list" }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Bad Request: Invalid or missing MCP session" },
      id: null,
    });
  });

  it("rejects an unknown session id", async () => {
    const response = await fetch(endpoint("/"), {
      method: "POST",
      headers: {
        "content-type": "application/json",
        accept: "application/json, text/event-stream",
        "mcp-session-id": "no-such-session",
      },
      body: JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/list" }),
    });

    expect(response.status).toBe(400);
  });

  it("serves tool calls within a session and drops the session on termination", async () => {
    compute.getInstance.mockResolvedValue(makeInstance());
    const transport = new StreamableHTTPClientTransport(new URL(endpoint("/mcp")));
    const client = new Client({ name: "test-client", version: "0.0.0" });
    await client.connect(transport);

    expect(running.openSessions).toBe(1);

    const result = CallToolResultSchema.parse(
      await client.callTool({
        name: "get_compute_instance",
        arguments: { instance_id: "ocid1.instance.oc1.iad.abc123" },
      }),
    );
    const texts = result.content.flatMap((item) => (item.type === "text" ? [item.text] : []));
    expect(JSON.parse(texts[0] ?? "")).toMatchObject({
      id: "ocid1.instance.oc1.iad.abc123",
      display_name: "web-01",
    });

    await transport.terminateSession();
    await client.close();

    expect(running.openSessions).toBe(0);
  });
});
