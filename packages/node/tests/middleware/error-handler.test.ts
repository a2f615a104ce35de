/**
 * Tests for the global error handler.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { BudgetError } from "@allotment/budget";
import { EventStoreError } from "@allotment/event-store";
import { createErrorHandler, statusForCode } from "../../src/middleware/error-handler.js";
import { captureLogger } from "../setup.js";

function appThrowing(err: Error, logger = captureLogger().logger): Hono {
  const app = new Hono();
  app.onError(createErrorHandler(logger));
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("statusForCode", () => {
  it.each([
    ["INVALID_AMOUNT", 400],
    ["INVALID_CATEGORY", 400],
    ["BUDGET_NOT_FOUND", 404],
    ["ALREADY_INITIALIZED", 409],
    ["SUBDIVISION_EXISTS", 409],
    ["EXCEEDS_CATEGORY_BUDGET", 422],
    ["INSUFFICIENT_FUNDS", 422],
    ["DIVIDE_BY_ZERO", 422],
    ["DAILY_LIMIT_EXCEEDED", 429],
    ["CONCURRENCY_CONFLICT", 409],
    ["EMPTY_APPEND", 400],
  ] as const)("maps %s to %i", (code, status) => {
    expect(statusForCode(code)).toBe(status);
  });
});

describe("createErrorHandler", () => {
  it("renders a BudgetError with its code", async () => {
    const res = await appThrowing(
      new BudgetError("SUBDIVISION_EXISTS", "Sub-division 'Rent' already exists in 'Needs'"),
    ).request("/boom");

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: {
        code: "SUBDIVISION_EXISTS",
        message: "Sub-division 'Rent' already exists in 'Needs'",
      },
    });
  });

  it("renders an EventStoreError with its code", async () => {
    const res = await appThrowing(
      new EventStoreError("CONCURRENCY_CONFLICT", "Stream moved on", "budget-alice"),
    ).request("/boom");

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: { code: "CONCURRENCY_CONFLICT", message: "Stream moved on" },
    });
  });

  it("passes an HTTPException's own response through", async () => {
    const res = await appThrowing(new HTTPException(413, { message: "Body too large" })).request("/boom");
    expect(res.status).toBe(413);
    expect(await res.text()).toBe("Body too large");
  });

  it("hides the message of an unknown error and logs it", async () => {
    const { logger, records } = captureLogger();
    const res = await appThrowing(new Error("secret detail"), logger).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 50,
      msg: "Unhandled error",
      err: { message: "secret detail" },
    });
  });
});
