/**
 * Budget Types
 *
 * Domain types for the budget ledger.
 *
 * A UserBudget partitions one identity's income into three fixed
 * categories. Each category can be carved into named sub-divisions.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Amounts are integer strings (deterministic bigint arithmetic)
 * - A record is replaced wholesale when an operation commits
 */

import type {
  Amount,
  CategoryName,
  SpendRecord,
} from "@allotment/types";

// =============================================================================
// Constants
// =============================================================================

/** Fixed category order for enumeration and apportionment */
export const CATEGORY_NAMES: readonly CategoryName[] = ["Needs", "Wants", "Savings"];

/** Length of a daily window */
export const DAY_MS = 86_400_000;

/** Income is divided by this to obtain the daily limit */
export const DAILY_LIMIT_DIVISOR = 30n;

/** Percentage of income assigned to Needs and Wants; Savings takes the rest */
export const NEEDS_PERCENT = 50n;
export const WANTS_PERCENT = 30n;

// =============================================================================
// Records
// =============================================================================

/**
 * A named bucket nested under one category.
 */
export interface SubDivision {
  /** Display label; also the key within the parent category */
  readonly name: string;

  /** Fixed target assigned at creation */
  readonly allocation: Amount;

  /** Cumulative amount withdrawn from this sub-division */
  readonly spent: Amount;

  /** floor(allocation * 100 / categoryAllocation), computed at creation */
  readonly percentOfCategory: number;

  readonly createdAt: string;
}

export interface Category {
  readonly name: CategoryName;

  /** Assigned at initialization, immutable thereafter */
  readonly allocation: Amount;

  /** Category-level, general-pool and sub-division spends */
  readonly spent: Amount;

  readonly subDivisions: Readonly<Record<string, SubDivision>>;

  /**
   * Insertion order of sub-division names. Under the overwrite policy a
   * re-added name appears once per insertion.
   */
  readonly subDivisionOrder: readonly string[];
}

/**
 * One identity's budget.
 */
export interface UserBudget {
  readonly identity: string;
  readonly totalIncome: Amount;
  readonly dailyLimit: Amount;

  /** Spent within the current daily window */
  readonly dailySpent: Amount;

  /** ISO 8601 start of the current daily window */
  readonly lastResetAt: string;

  /** When true every spend is checked against dailyLimit */
  readonly strictMode: boolean;

  readonly categories: Readonly<Record<CategoryName, Category>>;
  readonly initializedAt: string;
}

/**
 * Result of a general-pool spend. The event sink receives the
 * plain SpendRecord; callers also get the per-category shares.
 */
export interface GeneralSpendRecord extends SpendRecord {
  readonly shares: Readonly<Record<CategoryName, Amount>>;
}

// =============================================================================
// Policy
// =============================================================================

/**
 * Switches between the legacy behaviour and stricter alternatives
 * for the ledger's known quirks.
 */
export interface LedgerPolicy {
  /** Second initializeBudget on an identity: replace it, or fail */
  readonly reinitialize: "overwrite" | "reject";

  /** addSubDivision with a name already present: replace it, or fail */
  readonly duplicateSubDivision: "overwrite" | "reject";

  /**
   * A general-pool share larger than its category's remaining balance:
   * allow the overshoot when the aggregate check passes, or fail.
   */
  readonly generalOverspend: "allow" | "reject";

  /** Whether dailySpent keeps counting while strict mode is off */
  readonly lenientDailyTracking: "accumulate" | "skip";

  /**
   * "enforced" caps the sum of sub-division allocations at the category
   * allocation, and makes sub-division spends draw on category capacity.
   */
  readonly categoryCeiling: "legacy" | "enforced";
}

export const LEGACY_POLICY: LedgerPolicy = {
  reinitialize: "overwrite",
  duplicateSubDivision: "overwrite",
  generalOverspend: "allow",
  lenientDailyTracking: "accumulate",
  categoryCeiling: "legacy",
};

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Receives exactly one record per successful spend, after the
 * spend's state change is committed.
 */
export interface SpendEventSink {
  record(spend: SpendRecord): void;
}

export interface BudgetLedgerOptions {
  readonly policy?: Partial<LedgerPolicy> | undefined;

  /** Clock, read once per operation. Default: () => new Date() */
  readonly now?: (() => Date) | undefined;

  readonly sink?: SpendEventSink | undefined;
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Serializable state of the whole ledger, for a host durable store.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly budgets: readonly UserBudget[];
  readonly createdAt: string;
}

// =============================================================================
// Errors
// =============================================================================

export type BudgetErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_IDENTITY"
  | "INVALID_CATEGORY"
  | "INVALID_SUBDIVISION"
  | "EXCEEDS_CATEGORY_BUDGET"
  | "INSUFFICIENT_FUNDS"
  | "DAILY_LIMIT_EXCEEDED"
  | "DIVIDE_BY_ZERO"
  | "BUDGET_NOT_FOUND"
  | "ALREADY_INITIALIZED"
  | "SUBDIVISION_EXISTS";

export class BudgetError extends Error {
  public readonly code: BudgetErrorCode;
  constructor(code: BudgetErrorCode, message: string) {
    super(message);
    this.name = "BudgetError";
    this.code = code;
  }
}
