/** Environment variables read by the CLI. */
export const BRIDGE_ENV = {
  CONFIG: "RPCBRIDGE_CONFIG",
  LISTEN: "RPCBRIDGE_LISTEN",
  SERVER: "RPCBRIDGE_SERVER",
  LOG_LEVEL: "RPCBRIDGE_LOG_LEVEL",
  TIMEOUT_MS: "RPCBRIDGE_TIMEOUT_MS",
} as const;

export function getEnv(key: keyof typeof BRIDGE_ENV): string | undefined {
  const value = process.env[BRIDGE_ENV[key]];
  return value === "" ? undefined : value;
}
