import { describe, it, expect } from "vitest";
import { isValidFormat, isValidLevel, redactSecrets } from "../../src/shared/logging.js";

describe("redactSecrets", () => {
  it("masks bearer tokens", () => {
    expect(redactSecrets("Authorization: Bearer test-secret-token")).toBe("Authorization: Bearer [REDACTED]");
  });

  it("masks token and key assignments", () => {
    expect(redactSecrets("GITHUB_TOKEN=test-secret OPENAI_API_KEY=placeholder")).toBe(
      "GITHUB_TOKEN=[REDACTED] OPENAI_API_KEY=[REDACTED]"
    );
  });

  it("masks JSON-style secrets", () => {
    expect(redactSecrets('{"DB_PASSWORD":"test-secret"}')).toBe('{"DB_PASSWORD":"[REDACTED]"}');
  });

  it("leaves ordinary text alone", () => {
    expect(redactSecrets("server started on port 8000")).toBe("server started on port 8000");
  });
});

describe("level and format guards", () => {
  it("accepts known values only", () => {
    expect(isValidLevel("debug")).toBe(true);
    expect(isValidLevel("trace")).toBe(false);
    expect(isValidFormat("json")).toBe(true);
    expect(isValidFormat("xml")).toBe(false);
  });
});
