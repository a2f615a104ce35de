/**
 * @allotment/types — Shared domain types for the Allotment budget ledger.
 *
 * These types are used across all Allotment packages:
 * - Amounts, categories and spend records
 * - Read models returned by the ledger
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Budget types
export type {
  Amount,
  CategoryName,
  SpendCategory,
  SpendRecord,
  BudgetSummary,
  SubDivisionView,
  CategoryView,
  DailyStatus,
} from "./budget.js";
export { GENERAL_POOL } from "./budget.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isAmount,
  isCategoryName,
  isSpendRecord,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
