export const DEFAULT_LISTEN = "127.0.0.1:8000";
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8000;
export const DEFAULT_CONFIG_FILE = "mcp_config.json";

/** Protocol revision sent in the `initialize` handshake. */
export const PROTOCOL_VERSION = "2024-11-05";
export const CLIENT_NAME = "rpcbridge";
export const CLIENT_VERSION = "0.1.0";

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 30_000;
export const DEFAULT_TERMINATE_GRACE_MS = 2_000;
