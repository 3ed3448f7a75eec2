/**
 * JSON-RPC codec for newline-delimited JSON over a child's stdio.
 */

import { MalformedMessageError, errorMessage } from "../../shared/errors.js";
import type { JsonRpcId, JsonRpcNotification, JsonRpcRequest, RpcMessage } from "./types.js";
import { parseEnvelope } from "./validate.js";

/** Serialize one message as a single line of JSON, without the trailing newline. */
export function encode(message: RpcMessage): string {
  return JSON.stringify({ ...message, jsonrpc: "2.0" });
}

/** Parse one line of JSON text into a message. Throws MalformedMessageError. */
export function decode(line: string): RpcMessage {
  const trimmed = line.trim();
  if (!trimmed) {
    throw new MalformedMessageError("Empty line", line);
  }
  let data: unknown;
  try {
    data = JSON.parse(trimmed) as unknown;
  } catch (err) {
    throw new MalformedMessageError(`Invalid JSON: ${errorMessage(err)}`, line);
  }
  try {
    return parseEnvelope(data);
  } catch (err) {
    if (err instanceof MalformedMessageError) {
      throw new MalformedMessageError(err.message, line);
    }
    throw err;
  }
}

function hasParams(params: unknown): boolean {
  if (params === undefined) return false;
  if (params !== null && typeof params === "object" && !Array.isArray(params)) {
    return Object.keys(params).length > 0;
  }
  return true;
}

/** Build a request; empty `params` objects are left off the wire. */
export function request(id: JsonRpcId, method: string, params?: unknown): JsonRpcRequest {
  return { jsonrpc: "2.0", id, method, ...(hasParams(params) && { params }) };
}

export function notification(method: string, params?: unknown): JsonRpcNotification {
  return { jsonrpc: "2.0", method, ...(hasParams(params) && { params }) };
}
