/**
 * @allotment/budget — Budget allocation and spend-enforcement engine.
 *
 * Per-identity budgets partitioned 50 / 30 / 20 into Needs, Wants and
 * Savings, with named sub-divisions, a daily spending cap and
 * proportional general-pool withdrawals.
 *
 * Design rules:
 * - All arithmetic uses bigint (no floating point)
 * - Operations are all-or-nothing
 * - Fail-closed: invalid input throws BudgetError, never silently succeeds
 * - Zero runtime dependencies beyond @allotment/types
 */

// Core engine
export { BudgetLedger } from "./budget-ledger.js";

// Arithmetic
export {
  parseAmount,
  parsePositiveAmount,
  formatAmount,
  mulDiv,
  sumAmounts,
} from "./amount.js";
export {
  splitIncome,
  dailyLimitFor,
  apportion,
  percentOf,
} from "./allocation.js";
export type { CategoryAmounts } from "./allocation.js";
export { chargeDailyWindow, isRolloverDue } from "./daily-window.js";
export type { DailyWindowState, DailyWindowCharge } from "./daily-window.js";

// Types
export type {
  SubDivision,
  Category,
  UserBudget,
  GeneralSpendRecord,
  LedgerPolicy,
  SpendEventSink,
  BudgetLedgerOptions,
  LedgerSnapshot,
  BudgetErrorCode,
} from "./types.js";
export {
  BudgetError,
  CATEGORY_NAMES,
  DAY_MS,
  DAILY_LIMIT_DIVISOR,
  NEEDS_PERCENT,
  WANTS_PERCENT,
  LEGACY_POLICY,
} from "./types.js";
