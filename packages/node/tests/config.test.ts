/**
 * Tests for config.ts — loadConfig + policyFromConfig.
 */

import { describe, it, expect } from "vitest";
import { LEGACY_POLICY } from "@allotment/budget";
import { loadConfig, policyFromConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      IDENTITY_HEADER: "X-Identity-Id",
      IDEMPOTENCY_TTL_MS: 86400000,
      REINITIALIZE: "overwrite",
      DUPLICATE_SUBDIVISION: "overwrite",
      GENERAL_OVERSPEND: "allow",
      LENIENT_DAILY_TRACKING: "accumulate",
      CATEGORY_CEILING: "legacy",
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ PORT: "8080", IDEMPOTENCY_TTL_MS: "5000" });
    expect(config.PORT).toBe(8080);
    expect(config.IDEMPOTENCY_TTL_MS).toBe(5000);
  });

  it("keeps an event log path when set", () => {
    expect(loadConfig({ EVENT_LOG_PATH: "/var/lib/allotment/events.jsonl" }).EVENT_LOG_PATH).toBe(
      "/var/lib/allotment/events.jsonl",
    );
  });

  it("throws on invalid values", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
    expect(() => loadConfig({ CATEGORY_CEILING: "strict" })).toThrow();
  });
});

describe("policyFromConfig", () => {
  it("maps the defaults to the legacy policy", () => {
    expect(policyFromConfig(loadConfig({}))).toEqual(LEGACY_POLICY);
  });

  it("maps every switch", () => {
    const config = loadConfig({
      REINITIALIZE: "reject",
      DUPLICATE_SUBDIVISION: "reject",
      GENERAL_OVERSPEND: "reject",
      LENIENT_DAILY_TRACKING: "skip",
      CATEGORY_CEILING: "enforced",
    });
    expect(policyFromConfig(config)).toEqual({
      reinitialize: "reject",
      duplicateSubDivision: "reject",
      generalOverspend: "reject",
      lenientDailyTracking: "skip",
      categoryCeiling: "enforced",
    });
  });
});
