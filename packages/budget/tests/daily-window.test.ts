/**
 * Tests for daily-limit enforcement.
 */

import { describe, it, expect } from "vitest";
import { chargeDailyWindow, isRolloverDue } from "../src/daily-window.js";
import type { DailyWindowState } from "../src/daily-window.js";
import { DAY_MS } from "../src/types.js";

const START = "2025-03-01T08:00:00.000Z";
const START_MS = Date.parse(START);

function at(offsetMs: number): Date {
  return new Date(START_MS + offsetMs);
}

function window(overrides: Partial<DailyWindowState> = {}): DailyWindowState {
  return {
    dailyLimit: "100",
    dailySpent: "0",
    lastResetAt: START,
    strictMode: true,
    ...overrides,
  };
}

describe("isRolloverDue", () => {
  it("is false within the first day", () => {
    expect(isRolloverDue(START, at(1000))).toBe(false);
  });

  it("is false at exactly one day", () => {
    expect(isRolloverDue(START, at(DAY_MS))).toBe(false);
  });

  it("is true one millisecond after a day", () => {
    expect(isRolloverDue(START, at(DAY_MS + 1))).toBe(true);
  });
});

describe("chargeDailyWindow (strict)", () => {
  it("adds the amount within the limit", () => {
    const charge = chargeDailyWindow(window({ dailySpent: "40" }), 60n, at(0), "accumulate");
    expect(charge).toEqual({ dailySpent: "100", lastResetAt: START });
  });

  it("throws DAILY_LIMIT_EXCEEDED past the limit", () => {
    expect(() =>
      chargeDailyWindow(window({ dailySpent: "40" }), 61n, at(0), "accumulate"),
    ).toThrow("Daily limit exceeded: spent 40 of 100, requested 61");
  });

  it("resets the window before checking once a day has passed", () => {
    const now = at(DAY_MS + 1);
    const charge = chargeDailyWindow(window({ dailySpent: "100" }), 30n, now, "accumulate");
    expect(charge).toEqual({ dailySpent: "30", lastResetAt: now.toISOString() });
  });

  it("rolls over to now, not to a day boundary, after several days", () => {
    const now = at(DAY_MS * 5 + 12_345);
    const charge = chargeDailyWindow(window({ dailySpent: "90" }), 10n, now, "accumulate");
    expect(charge.lastResetAt).toBe(now.toISOString());
    expect(charge.dailySpent).toBe("10");
  });

  it("still fails after a rollover when the amount alone exceeds the limit", () => {
    expect(() =>
      chargeDailyWindow(window({ dailySpent: "100" }), 101n, at(DAY_MS + 1), "accumulate"),
    ).toThrow(/Daily limit exceeded: spent 0 of 100/);
  });
});

describe("chargeDailyWindow (lenient)", () => {
  it("accumulates without checking the limit", () => {
    const charge = chargeDailyWindow(
      window({ strictMode: false, dailySpent: "90" }),
      500n,
      at(0),
      "accumulate",
    );
    expect(charge).toEqual({ dailySpent: "590", lastResetAt: START });
  });

  it("never rolls over while lenient", () => {
    const charge = chargeDailyWindow(
      window({ strictMode: false, dailySpent: "90" }),
      5n,
      at(DAY_MS * 3),
      "accumulate",
    );
    expect(charge.lastResetAt).toBe(START);
  });

  it("leaves the counter alone under the skip policy", () => {
    const charge = chargeDailyWindow(
      window({ strictMode: false, dailySpent: "90" }),
      500n,
      at(0),
      "skip",
    );
    expect(charge).toEqual({ dailySpent: "90", lastResetAt: START });
  });
});
