/** How to launch the child server. Resolved once from config, never mutated. */
export interface ServerSpec {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  /** Merged over the parent environment when set. */
  readonly env?: Readonly<Record<string, string>>;
  readonly cwd?: string;
}

export type SessionState = "disconnected" | "connecting" | "ready" | "closed";

/** What to do with a call issued while another one is still in flight. */
export type BusyPolicy = "queue" | "reject";

export interface PendingCall {
  id: number;
  method: string;
}

export interface HealthStatus {
  status: "healthy";
  mcp_connected: boolean;
  config_loaded: boolean;
  state: SessionState;
  server?: string;
}
