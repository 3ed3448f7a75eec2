import { describe, it, expect, afterEach, vi } from "vitest";
import { BridgeApi } from "../../src/bridge/api.js";
import { createBridgeApp, toFailure } from "../../src/bridge/server.js";
import { SessionManager } from "../../src/bridge/session.js";
import {
  HandshakeFailedError,
  NotConnectedError,
  RemoteError,
  SessionBusyError,
  TimeoutError,
  TransportFailedError,
} from "../../src/shared/errors.js";
import { createFakeServer, type Handler } from "./fake-server.js";

const tools = [{ name: "echo", description: "Echo text", inputSchema: { type: "object" } }];

const handler: Handler = (msg) => {
  if (msg.id === undefined) return undefined;
  switch (msg.method) {
    case "initialize":
      return { jsonrpc: "2.0", id: msg.id, result: {} };
    case "tools/list":
      return { jsonrpc: "2.0", id: msg.id, result: { tools } };
    case "tools/call":
      return { jsonrpc: "2.0", id: msg.id, result: { content: [{ type: "text", text: JSON.stringify(msg.params) }] } };
    case "resources/list":
      return { jsonrpc: "2.0", id: msg.id, result: { resources: [], params: msg.params ?? null } };
    default:
      return { jsonrpc: "2.0", id: msg.id, error: { code: -32601, message: "Method not found" } };
  }
};

async function setup(options: { connect?: boolean; configLoaded?: boolean } = {}) {
  const server = createFakeServer(handler);
  const session = new SessionManager({
    spec: { name: "fake", command: "fake", args: [] },
    openTransport: () => Promise.resolve(server.supervisor()),
  });
  if (options.connect !== false) await session.connect();
  const app = createBridgeApp(new BridgeApi({ session, configLoaded: options.configLoaded ?? true }));
  return { server, session, app };
}

function post(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  };
}

describe("bridge HTTP routes", () => {
  let session: SessionManager | undefined;

  afterEach(async () => {
    await session?.disconnect();
    session = undefined;
  });

  it("GET / reports the connection", async () => {
    const ctx = await setup();
    session = ctx.session;
    const res = await ctx.app.request("/");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: "MCP Bridge API is running", connected: true });
  });

  it("GET /health reads state without touching the server", async () => {
    const ctx = await setup({ configLoaded: false });
    session = ctx.session;
    await vi.waitFor(() => expect(ctx.server.lines).toHaveLength(2));
    const res = await ctx.app.request("/health");
    expect(await res.json()).toEqual({
      status: "healthy",
      mcp_connected: true,
      config_loaded: false,
      state: "ready",
      server: "fake",
    });
    expect(ctx.server.lines).toHaveLength(2);
  });

  it("GET /tools lists tools", async () => {
    const ctx = await setup();
    session = ctx.session;
    const res = await ctx.app.request("/tools");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, result: { tools } });
    expect(ctx.server.lines[2]).toBe('{"jsonrpc":"2.0","id":2,"method":"tools/list"}');
  });

  it("POST /tools/call forwards name and arguments", async () => {
    const ctx = await setup();
    session = ctx.session;
    const res = await ctx.app.request("/tools/call", post({ tool_name: "echo", parameters: { text: "hi" } }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      result: { content: [{ type: "text", text: '{"name":"echo","arguments":{"text":"hi"}}' }] },
    });
  });

  it("POST /tools/call rejects a body without tool_name", async () => {
    const ctx = await setup();
    session = ctx.session;
    const res = await ctx.app.request("/tools/call", post({ parameters: {} }));
    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ success: false });
    expect(ctx.server.received.map((m) => m.method)).not.toContain("tools/call");
  });

  it("POST /tools/call rejects invalid JSON", async () => {
    const ctx = await setup();
    session = ctx.session;
    const res = await ctx.app.request("/tools/call", post("{oops"));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: "Invalid JSON body" });
  });

  it("POST /mcp/request passes method and params through", async () => {
    const ctx = await setup();
    session = ctx.session;
    const res = await ctx.app.request("/mcp/request", post({ method: "resources/list", params: { cursor: "c1" } }));
    expect(await res.json()).toEqual({ success: true, result: { resources: [], params: { cursor: "c1" } } });
  });

  it("POST /mcp/request sends no params when none are given", async () => {
    const ctx = await setup();
    session = ctx.session;
    const res = await ctx.app.request("/mcp/request", post({ method: "resources/list" }));
    expect(await res.json()).toEqual({ success: true, result: { resources: [], params: null } });
    expect(ctx.server.lines[2]).toBe('{"jsonrpc":"2.0","id":2,"method":"resources/list"}');
  });

  it("maps remote errors to 502 with the remote code", async () => {
    const ctx = await setup();
    session = ctx.session;
    const res = await ctx.app.request("/mcp/request", post({ method: "nope" }));
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      success: false,
      error: "Method not found",
      code: -32601,
      kind: "REMOTE_ERROR",
    });
    expect(ctx.session.state).toBe("ready");
  });

  it("returns 503 while disconnected and reconnects only on request", async () => {
    const ctx = await setup({ connect: false });
    session = ctx.session;

    const failed = await ctx.app.request("/tools");
    expect(failed.status).toBe(503);
    expect(await failed.json()).toEqual({
      success: false,
      error: "MCP server not connected",
      kind: "NOT_CONNECTED",
    });
    expect(ctx.server.lines).toHaveLength(0);

    const connected = await ctx.app.request("/session/connect", { method: "POST" });
    expect(await connected.json()).toEqual({ success: true, result: { state: "ready" } });

    const ok = await ctx.app.request("/tools");
    expect(ok.status).toBe(200);
  });

  it("reports a missing server configuration", async () => {
    const app = createBridgeApp(new BridgeApi({ session: null, configLoaded: false }));
    const health = await app.request("/health");
    expect(await health.json()).toEqual({
      status: "healthy",
      mcp_connected: false,
      config_loaded: false,
      state: "disconnected",
    });
    const res = await app.request("/tools");
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ success: false, error: "No MCP server configured", kind: "NOT_CONNECTED" });
  });

  it("allows cross-origin callers", async () => {
    const ctx = await setup();
    session = ctx.session;
    const res = await ctx.app.request("/health", { headers: { Origin: "http://localhost:3000" } });
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
  });
});

describe("toFailure", () => {
  it("maps each error kind to a status", () => {
    expect(toFailure(new SessionBusyError()).status).toBe(409);
    expect(toFailure(new TransportFailedError("gone")).status).toBe(503);
    expect(toFailure(new TransportFailedError("slow", { cause: new TimeoutError(10) })).status).toBe(504);
    expect(toFailure(new HandshakeFailedError("no")).status).toBe(503);
    expect(toFailure(new NotConnectedError()).status).toBe(503);
    expect(toFailure(new RemoteError(-1, "x")).status).toBe(502);
    expect(toFailure(new Error("bug"))).toEqual({ status: 500, body: { success: false, error: "bug" } });
  });
});
