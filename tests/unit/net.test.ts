import { describe, it, expect } from "vitest";
import { bridgeUrl, parseListen } from "../../src/shared/net.js";

describe("parseListen", () => {
  it("falls back to 127.0.0.1:8000", () => {
    expect(parseListen("")).toEqual({ host: "127.0.0.1", port: 8000 });
  });

  it("accepts host:port", () => {
    expect(parseListen("0.0.0.0:9000")).toEqual({ host: "0.0.0.0", port: 9000 });
  });

  it("accepts a bare port", () => {
    expect(parseListen("8123")).toEqual({ host: "127.0.0.1", port: 8123 });
  });

  it("defaults the host when only :port is given", () => {
    expect(parseListen(":8080")).toEqual({ host: "127.0.0.1", port: 8080 });
  });

  it("rejects out-of-range ports", () => {
    expect(parseListen("99999")).toEqual({ host: "127.0.0.1", port: 8000 });
    expect(parseListen("localhost:0")).toEqual({ host: "localhost", port: 8000 });
  });

  it("accepts bracketed IPv6 hosts", () => {
    expect(parseListen("[::1]:9001")).toEqual({ host: "::1", port: 9001 });
    expect(parseListen("[::]")).toEqual({ host: "::", port: 8000 });
  });

  it("rejects ports with trailing garbage", () => {
    expect(parseListen("127.0.0.1:80x")).toEqual({ host: "127.0.0.1", port: 8000 });
  });
});

describe("bridgeUrl", () => {
  it("formats IPv4 and IPv6 addresses", () => {
    expect(bridgeUrl({ host: "127.0.0.1", port: 8000 })).toBe("http://127.0.0.1:8000");
    expect(bridgeUrl({ host: "::1", port: 8000 })).toBe("http://[::1]:8000");
  });
});
