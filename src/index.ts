export { ProcessSupervisor, type ReadLineOptions, type TerminateOptions, type TransportStreams } from "./bridge/transport.js";
export { SessionManager, type ClientInfo, type SessionManagerOptions } from "./bridge/session.js";
export { BridgeApi, type BridgeApiOptions } from "./bridge/api.js";
export {
  createBridgeApp,
  startBridgeServer,
  toFailure,
  type BridgeHandle,
  type BridgeServerOptions,
} from "./bridge/server.js";
export { encode, decode, request, notification } from "./protocols/jsonrpc/codec.js";
export { isNotification, isRequest, isResponse, parseEnvelope } from "./protocols/jsonrpc/validate.js";
export type {
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  RpcMessage,
} from "./protocols/jsonrpc/types.js";
export { loadConfig, parseConfig, resolveServerSpec, type BridgeConfig } from "./config.js";
export * from "./shared/errors.js";
export { initLogger, getLogger } from "./shared/logging.js";
export type { BusyPolicy, HealthStatus, PendingCall, ServerSpec, SessionState } from "./types.js";
