import { type } from "arktype";

export const JsonRpcIdSchema = type("string | number");
export type JsonRpcId = typeof JsonRpcIdSchema.infer;

export const JsonRpcErrorObjectSchema = type({
  code: "number",
  message: "string",
  "data?": "unknown",
});
export type JsonRpcErrorObject = typeof JsonRpcErrorObjectSchema.infer;

// `jsonrpc` must be "2.0" when present; some servers leave it off their replies.
export const JsonRpcRequestSchema = type({
  "jsonrpc?": "'2.0'",
  id: JsonRpcIdSchema,
  method: "string",
  "params?": "unknown",
});

export const JsonRpcResponseSchema = type({
  "jsonrpc?": "'2.0'",
  id: "string | number | null",
  "result?": "unknown",
  "error?": JsonRpcErrorObjectSchema,
});

export const JsonRpcNotificationSchema = type({
  "jsonrpc?": "'2.0'",
  "id?": "null",
  method: "string",
  "params?": "unknown",
});

/** Fields outside the envelope are kept as-is so newer servers can add their own. */
type Extra = { [key: string]: unknown };

export type JsonRpcRequest = typeof JsonRpcRequestSchema.infer & Extra;
export type JsonRpcResponse = typeof JsonRpcResponseSchema.infer & Extra & { method?: undefined };
export type JsonRpcNotification = typeof JsonRpcNotificationSchema.infer & Extra;

export type RpcMessage = JsonRpcRequest | JsonRpcResponse | JsonRpcNotification;
