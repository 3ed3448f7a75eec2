import { type } from "arktype";
import { MalformedMessageError } from "../../shared/errors.js";
import {
  JsonRpcNotificationSchema,
  JsonRpcRequestSchema,
  JsonRpcResponseSchema,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type RpcMessage,
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed JSON value as a JSON-RPC 2.0 envelope.
 * Messages with a `method` are requests (id present) or notifications (id absent or null);
 * everything else must be a response carrying exactly one of `result` and `error`.
 */
export function parseEnvelope(data: unknown): RpcMessage {
  if (!isRecord(data)) {
    throw new MalformedMessageError("Invalid JSON-RPC: expected an object");
  }

  if ("method" in data) {
    if (data.id === undefined || data.id === null) {
      const out = JsonRpcNotificationSchema(data);
      if (out instanceof type.errors) {
        throw new MalformedMessageError(`Invalid JSON-RPC notification: ${out.summary}`);
      }
      return { ...data, ...out };
    }
    const out = JsonRpcRequestSchema(data);
    if (out instanceof type.errors) {
      throw new MalformedMessageError(`Invalid JSON-RPC request: ${out.summary}`);
    }
    return { ...data, ...out };
  }

  const hasResult = "result" in data;
  const hasError = "error" in data;
  if (hasResult === hasError) {
    throw new MalformedMessageError(
      "Invalid JSON-RPC response: expected exactly one of result or error"
    );
  }
  const out = JsonRpcResponseSchema(data);
  if (out instanceof type.errors) {
    throw new MalformedMessageError(`Invalid JSON-RPC response: ${out.summary}`);
  }
  return { ...data, ...out };
}

export function isRequest(msg: RpcMessage): msg is JsonRpcRequest {
  return typeof msg.method === "string" && msg.id !== undefined && msg.id !== null;
}

export function isNotification(msg: RpcMessage): msg is JsonRpcNotification {
  return typeof msg.method === "string" && (msg.id === undefined || msg.id === null);
}

export function isResponse(msg: RpcMessage): msg is JsonRpcResponse {
  return msg.method === undefined && ("result" in msg || "error" in msg);
}
