/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { BudgetErrorCode } from "@allotment/budget";
import type { EventStoreErrorCode } from "@allotment/event-store";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes produced at the HTTP layer, in addition to the
 * domain error codes passed through from the ledger and event store.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "MISSING_IDENTITY"
  | "PRECONDITION_FAILED"
  | "IDEMPOTENCY_CONFLICT"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

export type ErrorCode = ApiErrorCode | BudgetErrorCode | EventStoreErrorCode;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
