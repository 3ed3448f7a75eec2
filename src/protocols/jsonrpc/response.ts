import { RemoteError } from "../../shared/errors.js";
import type { JsonRpcErrorObject, JsonRpcId, JsonRpcRequest, JsonRpcResponse } from "./types.js";

export const JSONRPC_METHOD_NOT_FOUND = -32601;

export function jsonRpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

export function jsonRpcError(
  id: JsonRpcId | null,
  code: number,
  message: string,
  data?: unknown
): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: { code, message, ...(data !== undefined ? { data } : {}) } };
}

/**
 * Reply to a request the server sends while a call is waiting. The bridge offers no
 * roots or sampling handlers, so only `ping` gets a result.
 */
export function replyToServerRequest(msg: JsonRpcRequest): JsonRpcResponse {
  if (msg.method === "ping") return jsonRpcResult(msg.id, {});
  return jsonRpcError(msg.id, JSONRPC_METHOD_NOT_FOUND, "Method not found", { method: msg.method });
}

export function toRemoteError(error: JsonRpcErrorObject): RemoteError {
  return new RemoteError(error.code, error.message, error.data);
}
