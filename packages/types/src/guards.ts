/**
 * Runtime Type Guards
 *
 * Narrowing functions for Allotment domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, external integrations).
 */

import type { Amount, CategoryName, SpendRecord } from "./budget.js";
import { GENERAL_POOL } from "./budget.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Budget guards
// =============================================================================

const CATEGORY_NAMES = new Set<string>(["Needs", "Wants", "Savings"]);
const EVENT_SOURCES = new Set<string>(["ledger", "api"]);

export function isAmount(value: unknown): value is Amount {
  return typeof value === "string" && /^\d+$/.test(value);
}

export function isCategoryName(value: unknown): value is CategoryName {
  return typeof value === "string" && CATEGORY_NAMES.has(value);
}

export function isSpendRecord(value: unknown): value is SpendRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.identity === "string" &&
    v.identity.length > 0 &&
    (isCategoryName(v.category) || v.category === GENERAL_POOL) &&
    typeof v.subDivision === "string" &&
    isAmount(v.amount) &&
    typeof v.timestamp === "string"
  );
}

// =============================================================================
// Event guards
// =============================================================================

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source) &&
    (v.causationId === undefined || typeof v.causationId === "string")
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object" &&
    !Array.isArray(v.payload)
  );
}
