/**
 * Tests for the request ID and identity middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "../setup.js";

describe("requestIdMiddleware", () => {
  it("echoes an incoming request ID", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "abc-123" }));
    expect(res.headers.get("X-Request-Id")).toBe("abc-123");
  });

  it("generates a UUID when none is sent", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/health"));
    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("replaces an over-long request ID", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "x".repeat(129) }),
    );
    expect(res.headers.get("X-Request-Id")).not.toBe("x".repeat(129));
  });
});

describe("identityMiddleware", () => {
  it("rejects a blank identity", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/budget", "GET", undefined, { "X-Identity-Id": "   " }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "MISSING_IDENTITY", message: "Missing X-Identity-Id header" },
    });
  });

  it("reads the identity from a configured header and trims it", async () => {
    const { app, service } = createTestApp({ identityHeader: "X-User" });
    const res = await app.request(
      jsonRequest("/api/v1/budget", "POST", { income: "300" }, { "X-User": "  alice  " }),
    );
    expect(res.status).toBe(201);
    expect(service.getBudgetSummary("alice").income).toBe("300");
  });

  it("ignores the default header once another is configured", async () => {
    const { app } = createTestApp({ identityHeader: "X-User" });
    const res = await app.request(jsonRequest("/api/v1/budget", "GET", undefined, { "X-Identity-Id": "alice" }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "MISSING_IDENTITY", message: "Missing X-User header" },
    });
  });
});
