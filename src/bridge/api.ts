import { NotConnectedError } from "../shared/errors.js";
import type { HealthStatus, SessionState } from "../types.js";
import type { SessionManager } from "./session.js";

export interface BridgeApiOptions {
  /** Null when no server could be resolved from config. */
  session: SessionManager | null;
  /** Whether a config file was read; reported by health(). */
  configLoaded: boolean;
}

/**
 * What the HTTP routes call. Every method maps to exactly one session call;
 * none of them reconnect on failure.
 */
export class BridgeApi {
  private readonly session: SessionManager | null;
  private readonly configLoaded: boolean;

  constructor(opts: BridgeApiOptions) {
    this.session = opts.session;
    this.configLoaded = opts.configLoaded;
  }

  private requireSession(): SessionManager {
    if (!this.session) throw new NotConnectedError("No MCP server configured");
    return this.session;
  }

  get connected(): boolean {
    return this.session?.connected ?? false;
  }

  listTools(): Promise<unknown> {
    return this.call("tools/list", {});
  }

  callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    return this.call("tools/call", { name, arguments: args });
  }

  rawRequest(method: string, params?: Record<string, unknown> | null): Promise<unknown> {
    return this.call(method, params ?? {});
  }

  private async call(method: string, params: Record<string, unknown>): Promise<unknown> {
    return this.requireSession().call(method, params);
  }

  /** Explicit reconnect, issued by the caller after a transport failure. */
  async connect(): Promise<{ state: SessionState }> {
    const session = this.requireSession();
    await session.connect();
    return { state: session.state };
  }

  health(): HealthStatus {
    return {
      status: "healthy",
      mcp_connected: this.connected,
      config_loaded: this.configLoaded,
      state: this.session?.state ?? "disconnected",
      ...(this.session ? { server: this.session.serverName } : {}),
    };
  }
}
