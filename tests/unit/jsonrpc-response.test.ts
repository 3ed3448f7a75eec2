import { describe, it, expect } from "vitest";
import {
  JSONRPC_METHOD_NOT_FOUND,
  jsonRpcError,
  jsonRpcResult,
  replyToServerRequest,
  toRemoteError,
} from "../../src/protocols/jsonrpc/response.js";
import { RemoteError } from "../../src/shared/errors.js";

describe("jsonRpcError", () => {
  it("omits data when none is given", () => {
    expect(jsonRpcError(1, -32600, "Invalid Request")).toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: -32600, message: "Invalid Request" },
    });
  });

  it("accepts a null id", () => {
    expect(jsonRpcError(null, -32700, "Parse error").id).toBeNull();
  });
});

describe("jsonRpcResult", () => {
  it("returns result envelope", () => {
    expect(jsonRpcResult(42, { ok: true })).toEqual({ jsonrpc: "2.0", id: 42, result: { ok: true } });
  });
});

describe("replyToServerRequest", () => {
  it("answers ping with an empty result", () => {
    expect(replyToServerRequest({ jsonrpc: "2.0", id: "srv-1", method: "ping" })).toEqual({
      jsonrpc: "2.0",
      id: "srv-1",
      result: {},
    });
  });

  it("answers anything else with method not found", () => {
    expect(replyToServerRequest({ jsonrpc: "2.0", id: 7, method: "roots/list" })).toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: { code: JSONRPC_METHOD_NOT_FOUND, message: "Method not found", data: { method: "roots/list" } },
    });
  });
});

describe("toRemoteError", () => {
  it("keeps code, message and data", () => {
    const err = toRemoteError({ code: -32000, message: "boom", data: { retry: false } });
    expect(err).toBeInstanceOf(RemoteError);
    expect(err).toMatchObject({ rpcCode: -32000, message: "boom", data: { retry: false } });
  });
});
