/**
 * SDK Integration Tests
 *
 * Wires the AllotmentClient to a real createApp() Hono instance
 * (in-memory, no HTTP server). Proves the SDK and server are
 * type-compatible and the budget lifecycle works end-to-end.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { pino } from "pino";
import { InMemoryEventStore } from "@allotment/event-store";
import { createApp, LedgerService } from "@allotment/node";
import type { AppInstance } from "@allotment/node";
import { AllotmentClient } from "../src/client.js";
import { AllotmentError } from "../src/types.js";
import type { FetchFn } from "../src/types.js";

// =============================================================================
// Bridge: Hono app.request() as fetch function
// =============================================================================

function createAppFetch(instance: AppInstance): FetchFn {
  return async (input, init) => instance.app.request(input, init);
}

// =============================================================================
// Setup
// =============================================================================

const T0 = "2025-03-01T08:00:00.000Z";

let instance: AppInstance;
let alice: AllotmentClient;

function clientFor(identity: string): AllotmentClient {
  return new AllotmentClient({
    baseUrl: "http://localhost",
    identity,
    fetchFn: createAppFetch(instance),
    retries: 0,
  });
}

beforeEach(() => {
  const now = (): Date => new Date(T0);
  instance = createApp({
    service: new LedgerService({
      eventStore: new InMemoryEventStore({ now }),
      logger: pino({ level: "silent" }),
      now,
    }),
  });
  alice = clientFor("alice");
});

// =============================================================================
// Budget Lifecycle
// =============================================================================

describe("SDK → Server integration: budget lifecycle", () => {
  it("initializes, divides and spends", async () => {
    const init = await alice.budget.initialize("30000");
    expect(init.status).toBe(201);
    expect(init.data.needsAllocation).toBe("15000");

    const sub = await alice.budget.addSubDivision("Needs", "Groceries", "3000");
    expect(sub.data).toEqual({ name: "Groceries", allocation: "3000", percentOfCategory: 20, spent: "0" });

    const spend = await alice.budget.spendFromSubDivision("Needs", "Groceries", "120");
    expect(spend.data).toEqual({
      identity: "alice",
      category: "Needs",
      subDivision: "Groceries",
      amount: "120",
      timestamp: T0,
    });

    const needs = await alice.budget.category("Needs");
    expect(needs.data).toEqual({ name: "Needs", allocation: "15000", spent: "120", remaining: "14880" });
    expect(needs.headers["etag"]).toMatch(/^"[0-9a-f]{16}"$/);
  });

  it("lists recorded spends across pages", async () => {
    await alice.budget.initialize("30000");
    await alice.budget.spendFromCategory("Wants", "10");
    await alice.budget.spendFromGeneral("100");

    const first = await alice.events.list({ limit: 1 });
    expect(first.data.data.map((e) => e.spend.amount)).toEqual(["10"]);
    expect(first.data.pagination.hasMore).toBe(true);

    const second = await alice.events.list({ limit: 1, cursor: first.data.pagination.cursor ?? "" });
    expect(second.data.data.map((e) => e.spend.category)).toEqual(["General"]);
    expect(second.data.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("replays a spend retried with the same idempotency key", async () => {
    await alice.budget.initialize("30000");
    await alice.budget.spendFromCategory("Wants", "10", { idempotencyKey: "pay-1" });
    const replay = await alice.budget.spendFromCategory("Wants", "10", { idempotencyKey: "pay-1" });

    expect(replay.headers["x-idempotent-replay"]).toBe("true");
    expect((await alice.budget.category("Wants")).data.spent).toBe("10");
  });

  it("applies a conditional strict-mode change", async () => {
    await alice.budget.initialize("30000");
    const daily = await alice.budget.daily();

    const updated = await alice.budget.setStrictMode(false, { ifMatch: daily.headers["etag"] });
    expect(updated.data.strictMode).toBe(false);

    await expect(
      alice.budget.setStrictMode(true, { ifMatch: daily.headers["etag"] }),
    ).rejects.toMatchObject({ code: "PRECONDITION_FAILED", statusCode: 412 });
  });
});

// =============================================================================
// Errors
// =============================================================================

describe("SDK → Server integration: errors", () => {
  it("surfaces 404 for an identity without a budget", async () => {
    const promise = clientFor("bob").budget.summary();
    await expect(promise).rejects.toBeInstanceOf(AllotmentError);
    await expect(promise).rejects.toMatchObject({ code: "BUDGET_NOT_FOUND", statusCode: 404 });
  });

  it("surfaces 429 once the daily limit is reached", async () => {
    await alice.budget.initialize("30000");
    await expect(alice.budget.spendFromCategory("Wants", "1001")).rejects.toMatchObject({
      code: "DAILY_LIMIT_EXCEEDED",
      statusCode: 429,
    });
  });

  it("surfaces validation errors with details", async () => {
    await expect(alice.budget.initialize("-5")).rejects.toMatchObject({
      code: "VALIDATION_ERROR",
      statusCode: 400,
      details: {
        issues: [{ path: "income", message: "Amount must be a non-negative integer string" }],
      },
    });
  });
});
