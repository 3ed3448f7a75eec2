import { serve } from "@hono/node-server";
import { type } from "arktype";
import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { parseListen } from "../shared/net.js";
import {
  BridgeError,
  EXIT,
  RemoteError,
  TimeoutError,
  errorMessage,
  exit,
} from "../shared/errors.js";
import { getLogger } from "../shared/logging.js";
import type { ServerSpec } from "../types.js";
import { BridgeApi } from "./api.js";
import { SessionManager, type SessionManagerOptions } from "./session.js";

export const ToolCallBodySchema = type({
  tool_name: "string",
  parameters: "Record<string, unknown>",
});

export const McpRequestBodySchema = type({
  method: "string",
  "params?": "Record<string, unknown> | null",
});

type FailureStatus = 400 | 409 | 500 | 502 | 503 | 504;

export interface Failure {
  status: FailureStatus;
  body: { success: false; error: string; code?: number; kind?: string };
}

/** Map a core error onto an HTTP failure. The bridge never retries or reconnects. */
export function toFailure(err: unknown): Failure {
  const message = errorMessage(err);
  if (err instanceof RemoteError) {
    return {
      status: 502,
      body: { success: false, error: message, code: err.rpcCode, kind: err.code },
    };
  }
  if (!(err instanceof BridgeError)) {
    return { status: 500, body: { success: false, error: message } };
  }
  const status: FailureStatus = (() => {
    switch (err.code) {
      case "SESSION_BUSY":
        return 409;
      case "TRANSPORT_FAILED":
        return err.cause instanceof TimeoutError ? 504 : 503;
      case "TIMEOUT":
        return 504;
      case "NOT_CONNECTED":
      case "SESSION_CLOSED":
      case "HANDSHAKE_FAILED":
      case "SPAWN_FAILED":
        return 503;
      default:
        return 500;
    }
  })();
  return { status, body: { success: false, error: message, kind: err.code } };
}

async function readJson(c: Context): Promise<unknown> {
  const raw = await c.req.text();
  if (!raw.trim()) return {};
  return JSON.parse(raw) as unknown;
}

export function createBridgeApp(api: BridgeApi): Hono {
  const logger = getLogger();
  const app = new Hono();

  app.use("*", cors());

  const run = async (c: Context, work: () => Promise<unknown>) => {
    try {
      const result = await work();
      return c.json({ success: true, result: result ?? {} });
    } catch (err) {
      const failure = toFailure(err);
      logger.warn({ path: c.req.path, status: failure.status, err: failure.body.error }, "Request failed");
      return c.json(failure.body, failure.status);
    }
  };

  const invalid = (c: Context, error: string) =>
    c.json({ success: false, error }, 400);

  app.get("/", (c) => c.json({ message: "MCP Bridge API is running", connected: api.connected }));
  app.get("/health", (c) => c.json(api.health()));

  app.get("/tools", (c) => run(c, () => api.listTools()));

  app.post("/tools/call", async (c) => {
    let data: unknown;
    try {
      data = await readJson(c);
    } catch {
      return invalid(c, "Invalid JSON body");
    }
    const body = ToolCallBodySchema(data);
    if (body instanceof type.errors) return invalid(c, body.summary);
    return run(c, () => api.callTool(body.tool_name, body.parameters));
  });

  app.post("/mcp/request", async (c) => {
    let data: unknown;
    try {
      data = await readJson(c);
    } catch {
      return invalid(c, "Invalid JSON body");
    }
    const body = McpRequestBodySchema(data);
    if (body instanceof type.errors) return invalid(c, body.summary);
    return run(c, () => api.rawRequest(body.method, body.params));
  });

  app.post("/session/connect", (c) => run(c, () => api.connect()));

  return app;
}

export interface BridgeServerOptions {
  /** Null when the config named no usable server; the bridge still serves /health. */
  spec: ServerSpec | null;
  configLoaded: boolean;
  session?: Omit<SessionManagerOptions, "spec">;
}

export interface BridgeHandle {
  port: number;
  host: string;
  session: SessionManager | null;
  close: () => Promise<void>;
}

/**
 * Start the session and the HTTP server. A failed handshake is logged and the server
 * starts anyway; callers reconnect with POST /session/connect. `close()` stops the HTTP
 * server and terminates the child.
 */
export async function startBridgeServer(
  listen: string,
  options: BridgeServerOptions
): Promise<BridgeHandle> {
  const logger = getLogger();
  const { host, port } = parseListen(listen);
  const session = options.spec ? new SessionManager({ ...options.session, spec: options.spec }) : null;

  if (session) {
    try {
      await session.connect();
    } catch (err) {
      logger.error({ err: errorMessage(err) }, "Failed to start MCP connection");
    }
  }

  const app = createBridgeApp(new BridgeApi({ session, configLoaded: options.configLoaded }));
  const nodeServer = serve({
    fetch: app.fetch,
    port,
    hostname: host,
  });

  nodeServer.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EADDRINUSE") {
      process.stderr.write(
        `ERROR: Cannot listen on ${host}:${port} (EADDRINUSE).\nFix: choose a different port with --listen ${host}:<port>\n`
      );
      const released = session ? session.disconnect() : Promise.resolve();
      void released.finally(() => exit(EXIT.SERVER_FAILURE));
      return;
    }
    throw err;
  });

  return {
    host,
    port,
    session,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        nodeServer.close((err) => (err ? reject(err) : resolve()));
      }).finally(() => session?.disconnect());
    },
  };
}
