import { describe, expect, it } from "vitest";
import { checkAuthorization, credentialMatches } from "../src/gateway/auth.js";

const url = new URL("http://127.0.0.1:3000/mcp");

describe("authorization gate", () => {
  it("accepts the raw API key as the whole header value", () => {
    expect(checkAuthorization("test-secret", url, "test-secret")).toEqual({ ok: true });
  });

  it("does not strip a Bearer scheme", () => {
    const decision = checkAuthorization("Bearer test-secret", url, "test-secret");
    expect(decision.ok).toBe(false);
    if (!decision.ok) {
      expect(decision.status).toBe(401);
      expect(decision.error.reason).toBe("invalid");
      expect(decision.error.message).toBe("Unauthorized: invalid API key");
    }
  });

  it("rejects a missing header", () => {
    const decision = checkAuthorization(undefined, url, "test-secret");
    expect(decision.ok).toBe(false);
    if (!decision.ok) {
      expect(decision.status).toBe(401);
      expect(decision.error.message).toBe("Unauthorized: missing Authorization header");
    }
  });

  it("is open when no API key is configured", () => {
    expect(checkAuthorization(undefined, url, undefined)).toEqual({ ok: true });
  });

  it("refuses credentials passed in the query string", () => {
    const decision = checkAuthorization("test-secret", new URL("http://127.0.0.1:3000/mcp?token=test-secret"), "test-secret");
    expect(decision.ok).toBe(false);
    if (!decision.ok) {
      expect(decision.status).toBe(400);
      expect(decision.error.reason).toBe("query_token");
    }
  });

  it("compares values of different lengths safely", () => {
    expect(credentialMatches("short", "a-much-longer-key")).toBe(false);
    expect(credentialMatches("same", "same")).toBe(true);
  });
});
