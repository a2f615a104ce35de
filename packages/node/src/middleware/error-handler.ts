/**
 * Global error handler.
 *
 * Catches errors thrown by route handlers and produces a consistent
 * error envelope. Known domain errors keep their code; anything else
 * becomes a 500 without leaking its message.
 */

import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { BudgetError } from "@allotment/budget";
import type { BudgetErrorCode } from "@allotment/budget";
import { EventStoreError } from "@allotment/event-store";
import type { EventStoreErrorCode } from "@allotment/event-store";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<BudgetErrorCode | EventStoreErrorCode, ContentfulStatusCode> = {
  // Budget errors
  INVALID_AMOUNT: 400,
  INVALID_IDENTITY: 400,
  INVALID_CATEGORY: 400,
  INVALID_SUBDIVISION: 400,
  BUDGET_NOT_FOUND: 404,
  ALREADY_INITIALIZED: 409,
  SUBDIVISION_EXISTS: 409,
  EXCEEDS_CATEGORY_BUDGET: 422,
  INSUFFICIENT_FUNDS: 422,
  DIVIDE_BY_ZERO: 422,
  DAILY_LIMIT_EXCEEDED: 429,

  // Event store errors
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
};

export function statusForCode(code: BudgetErrorCode | EventStoreErrorCode): ContentfulStatusCode {
  return STATUS_MAP[code];
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the handler registered with Hono's onError.
 */
export function createErrorHandler(logger?: Logger): ErrorHandler {
  return (err, c) => {
    if (err instanceof BudgetError || err instanceof EventStoreError) {
      return c.json(createErrorEnvelope(err.code, err.message), statusForCode(err.code));
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    logger?.error({ err }, "Unhandled error");
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
