/**
 * Budget Types
 *
 * The shapes exchanged between the budget engine, the event sink
 * and API consumers.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are non-negative integer strings in the smallest unit
 */

/**
 * An integer amount in the smallest unit, e.g. "1000".
 */
export type Amount = string;

/** The three top-level categories every budget is partitioned into */
export type CategoryName = "Needs" | "Wants" | "Savings";

/** Category label carried by events of general-pool spends */
export const GENERAL_POOL = "General";

/** Category label of a spend event */
export type SpendCategory = CategoryName | typeof GENERAL_POOL;

/**
 * The record emitted once per successful spend.
 */
export interface SpendRecord {
  readonly identity: string;
  readonly category: SpendCategory;
  /** Empty for category-level and general-pool spends */
  readonly subDivision: string;
  readonly amount: Amount;
  readonly timestamp: string;
}

/**
 * Immutable allocation snapshot of a budget. Does not include spent amounts.
 */
export interface BudgetSummary {
  readonly income: Amount;
  readonly dailyLimit: Amount;
  readonly needsAllocation: Amount;
  readonly wantsAllocation: Amount;
  readonly savingsAllocation: Amount;
}

/**
 * A sub-division as listed for display.
 */
export interface SubDivisionView {
  readonly name: string;
  readonly allocation: Amount;
  readonly percentOfCategory: number;
  readonly spent: Amount;
}

export interface CategoryView {
  readonly name: CategoryName;
  readonly allocation: Amount;
  readonly spent: Amount;
  /** allocation - spent; negative once a general-pool spend overshoots */
  readonly remaining: Amount;
}

export interface DailyStatus {
  readonly dailyLimit: Amount;
  readonly dailySpent: Amount;
  /** dailyLimit - dailySpent, floored at zero */
  readonly remaining: Amount;
  readonly lastResetAt: string;
  readonly strictMode: boolean;
  /** The next strict-mode spend will start a new daily window */
  readonly rolloverPending: boolean;
}
