/**
 * Budget Ledger — per-identity allocation and spend enforcement.
 *
 * Owns every UserBudget, keyed by identity. Each identity's income is
 * split into Needs / Wants / Savings; categories can be carved into
 * named sub-divisions; spends are checked against the sub-division,
 * category, aggregate and daily limits before they are recorded.
 *
 * Rules:
 * - All arithmetic uses bigint over integer strings
 * - Every check runs before the single commit at the end of an operation
 * - The clock is read once per operation
 * - The event sink sees one record per successful spend, after commit;
 *   a sink failure rolls the commit back and propagates
 */

import {
  GENERAL_POOL,
  isCategoryName,
} from "@allotment/types";
import type {
  Amount,
  BudgetSummary,
  CategoryName,
  CategoryView,
  DailyStatus,
  SpendRecord,
  SubDivisionView,
} from "@allotment/types";
import {
  formatAmount,
  parseAmount,
  parsePositiveAmount,
  sumAmounts,
} from "./amount.js";
import {
  apportion,
  dailyLimitFor,
  percentOf,
  splitIncome,
} from "./allocation.js";
import type { CategoryAmounts } from "./allocation.js";
import { chargeDailyWindow, isRolloverDue } from "./daily-window.js";
import type {
  BudgetLedgerOptions,
  Category,
  GeneralSpendRecord,
  LedgerPolicy,
  LedgerSnapshot,
  SpendEventSink,
  SubDivision,
  UserBudget,
} from "./types.js";
import {
  BudgetError,
  CATEGORY_NAMES,
  LEGACY_POLICY,
} from "./types.js";

// =============================================================================
// Budget Ledger
// =============================================================================

export class BudgetLedger {
  private readonly budgets: Map<string, UserBudget> = new Map();
  private readonly policy: LedgerPolicy;
  private readonly now: () => Date;
  private readonly sink: SpendEventSink | undefined;

  constructor(options: BudgetLedgerOptions = {}) {
    this.policy = { ...LEGACY_POLICY, ...options.policy };
    this.now = options.now ?? (() => new Date());
    this.sink = options.sink;
  }

  /**
   * The effective policy (legacy defaults merged with overrides).
   */
  get activePolicy(): LedgerPolicy {
    return this.policy;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Setup
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create an identity's budget, or replace it under the overwrite policy.
   */
  initializeBudget(identity: string, income: Amount): UserBudget {
    assertIdentity(identity);
    const total = parsePositiveAmount(income, "Income");

    if (this.budgets.has(identity) && this.policy.reinitialize === "reject") {
      throw new BudgetError(
        "ALREADY_INITIALIZED",
        `Budget for '${identity}' is already initialized`,
      );
    }

    const at = this.now().toISOString();
    const split = splitIncome(total);

    const budget: UserBudget = {
      identity,
      totalIncome: formatAmount(total),
      dailyLimit: formatAmount(dailyLimitFor(total)),
      dailySpent: "0",
      lastResetAt: at,
      strictMode: true,
      categories: {
        Needs: emptyCategory("Needs", split.Needs),
        Wants: emptyCategory("Wants", split.Wants),
        Savings: emptyCategory("Savings", split.Savings),
      },
      initializedAt: at,
    };

    this.budgets.set(identity, budget);
    return budget;
  }

  /**
   * Carve a named sub-division out of a category.
   *
   * A name outside the three fixed categories acts as a zero-allocation
   * category that is never stored.
   */
  addSubDivision(
    identity: string,
    category: string,
    name: string,
    amount: Amount,
  ): SubDivision {
    const budget = this.getUserBudget(identity);
    assertCategoryLabel(category);
    if (name.length === 0) {
      throw new BudgetError("INVALID_SUBDIVISION", "Sub-division name must be non-empty");
    }
    const value = parseAmount(amount, "Sub-division amount");

    if (!isCategoryName(category)) {
      if (value > 0n) {
        throw exceedsCategory(category, value, 0n);
      }
      return rejectZeroAllocation(category);
    }

    const current = budget.categories[category];
    const existing = ownSubDivision(current, name);
    if (existing !== undefined && this.policy.duplicateSubDivision === "reject") {
      throw new BudgetError(
        "SUBDIVISION_EXISTS",
        `Sub-division '${name}' already exists in '${category}'`,
      );
    }

    const allocation = parseAmount(current.allocation);
    const ceiling = this.policy.categoryCeiling === "enforced"
      ? allocation - reservedAllocation(current, name)
      : allocation;
    if (value > ceiling) {
      throw exceedsCategory(category, value, ceiling);
    }

    const subDivision: SubDivision = {
      name,
      allocation: formatAmount(value),
      spent: "0",
      percentOfCategory: percentOf(value, allocation),
      createdAt: this.now().toISOString(),
    };

    const updated: Category = {
      ...current,
      subDivisions: { ...current.subDivisions, [name]: subDivision },
      subDivisionOrder: [...current.subDivisionOrder, name],
    };

    this.commit(budget, { categories: { ...budget.categories, [category]: updated } });
    return subDivision;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Spending
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Spend from a sub-division. Charges both the sub-division and its category.
   */
  spendFromSubDivision(
    identity: string,
    category: string,
    subName: string,
    amount: Amount,
  ): SpendRecord {
    const now = this.now();
    const budget = this.getUserBudget(identity);
    assertCategoryLabel(category);
    if (subName.length === 0) {
      throw new BudgetError("INVALID_SUBDIVISION", "Sub-division name must be non-empty");
    }
    const value = parsePositiveAmount(amount, "Spend amount");

    const current = isCategoryName(category) ? budget.categories[category] : undefined;
    const sub = current !== undefined ? ownSubDivision(current, subName) : undefined;
    if (current === undefined || sub === undefined) {
      throw insufficient(`${category}/${subName}`, value, 0n);
    }

    const subRemaining = parseAmount(sub.allocation) - parseAmount(sub.spent);
    if (value > subRemaining) {
      throw insufficient(`${category}/${subName}`, value, subRemaining);
    }

    const categorySpent = parseAmount(current.spent);
    if (this.policy.categoryCeiling === "enforced") {
      const categoryRemaining = parseAmount(current.allocation) - categorySpent;
      if (value > categoryRemaining) {
        throw insufficient(category, value, categoryRemaining);
      }
    }

    const window = chargeDailyWindow(budget, value, now, this.policy.lenientDailyTracking);

    const updatedSub: SubDivision = {
      ...sub,
      spent: formatAmount(parseAmount(sub.spent) + value),
    };
    const updated: Category = {
      ...current,
      spent: formatAmount(categorySpent + value),
      subDivisions: { ...current.subDivisions, [subName]: updatedSub },
    };

    return this.commitSpend(budget, {
      ...window,
      categories: { ...budget.categories, [current.name]: updated },
    }, {
      identity,
      category: current.name,
      subDivision: subName,
      amount: formatAmount(value),
      timestamp: now.toISOString(),
    });
  }

  /**
   * Spend directly from a category. Sub-division balances are untouched.
   */
  spendFromCategory(identity: string, category: string, amount: Amount): SpendRecord {
    const now = this.now();
    const budget = this.getUserBudget(identity);
    assertCategoryLabel(category);
    const value = parsePositiveAmount(amount, "Spend amount");

    if (!isCategoryName(category)) {
      throw insufficient(category, value, 0n);
    }

    const current = budget.categories[category];
    const spent = parseAmount(current.spent);
    const remaining = parseAmount(current.allocation) - spent;
    if (value > remaining) {
      throw insufficient(category, value, remaining);
    }

    const window = chargeDailyWindow(budget, value, now, this.policy.lenientDailyTracking);

    const updated: Category = { ...current, spent: formatAmount(spent + value) };
    return this.commitSpend(budget, {
      ...window,
      categories: { ...budget.categories, [category]: updated },
    }, {
      identity,
      category,
      subDivision: "",
      amount: formatAmount(value),
      timestamp: now.toISOString(),
    });
  }

  /**
   * Spend from the whole budget, charged across the three categories
   * in proportion to their allocations.
   *
   * Only the aggregate remaining balance is checked under the "allow"
   * policy, so a category whose share exceeds its own remaining balance
   * is driven past its allocation.
   */
  spendFromGeneral(identity: string, amount: Amount): GeneralSpendRecord {
    const now = this.now();
    const budget = this.getUserBudget(identity);
    const value = parsePositiveAmount(amount, "Spend amount");

    const allocations = categoryAmounts(budget, (c) => parseAmount(c.allocation));
    const remaining = categoryAmounts(
      budget,
      (c) => parseAmount(c.allocation) - parseAmount(c.spent),
    );

    const aggregate = remaining.Needs + remaining.Wants + remaining.Savings;
    if (value > aggregate) {
      throw insufficient(GENERAL_POOL, value, aggregate);
    }

    const shares = apportion(value, allocations);
    if (this.policy.generalOverspend === "reject") {
      for (const name of CATEGORY_NAMES) {
        if (shares[name] > remaining[name]) {
          throw insufficient(name, shares[name], remaining[name]);
        }
      }
    }

    const window = chargeDailyWindow(budget, value, now, this.policy.lenientDailyTracking);

    const charge = (current: Category, share: bigint): Category => ({
      ...current,
      spent: formatAmount(parseAmount(current.spent) + share),
    });
    const record = this.commitSpend(budget, {
      ...window,
      categories: {
        Needs: charge(budget.categories.Needs, shares.Needs),
        Wants: charge(budget.categories.Wants, shares.Wants),
        Savings: charge(budget.categories.Savings, shares.Savings),
      },
    }, {
      identity,
      category: GENERAL_POOL,
      subDivision: "",
      amount: formatAmount(value),
      timestamp: now.toISOString(),
    });

    return {
      ...record,
      shares: {
        Needs: formatAmount(shares.Needs),
        Wants: formatAmount(shares.Wants),
        Savings: formatAmount(shares.Savings),
      },
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Settings
  // ───────────────────────────────────────────────────────────────────────

  toggleStrictMode(identity: string, enabled: boolean): UserBudget {
    const budget = this.getUserBudget(identity);
    return this.commit(budget, { strictMode: enabled });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  hasBudget(identity: string): boolean {
    return this.budgets.has(identity);
  }

  listIdentities(): readonly string[] {
    return [...this.budgets.keys()];
  }

  /**
   * Get an identity's full budget record.
   */
  getUserBudget(identity: string): UserBudget {
    assertIdentity(identity);
    const budget = this.budgets.get(identity);
    if (budget === undefined) {
      throw new BudgetError("BUDGET_NOT_FOUND", `No budget initialized for '${identity}'`);
    }
    return budget;
  }

  getBudgetSummary(identity: string): BudgetSummary {
    const budget = this.getUserBudget(identity);
    return {
      income: budget.totalIncome,
      dailyLimit: budget.dailyLimit,
      needsAllocation: budget.categories.Needs.allocation,
      wantsAllocation: budget.categories.Wants.allocation,
      savingsAllocation: budget.categories.Savings.allocation,
    };
  }

  /**
   * Sub-divisions of a category in insertion order. Unknown category
   * names have none.
   */
  getSubDivisions(identity: string, category: string): readonly SubDivisionView[] {
    const budget = this.getUserBudget(identity);
    assertCategoryLabel(category);
    if (!isCategoryName(category)) {
      return [];
    }

    const current = budget.categories[category];
    const views: SubDivisionView[] = [];
    for (const name of current.subDivisionOrder) {
      const sub = ownSubDivision(current, name);
      if (sub !== undefined) {
        views.push({
          name: sub.name,
          allocation: sub.allocation,
          percentOfCategory: sub.percentOfCategory,
          spent: sub.spent,
        });
      }
    }
    return views;
  }

  getCategory(identity: string, category: string): CategoryView {
    const budget = this.getUserBudget(identity);
    assertCategoryLabel(category);
    if (!isCategoryName(category)) {
      throw new BudgetError(
        "INVALID_CATEGORY",
        `Unknown category '${category}', expected one of ${CATEGORY_NAMES.join(", ")}`,
      );
    }

    const current = budget.categories[category];
    return {
      name: current.name,
      allocation: current.allocation,
      spent: current.spent,
      remaining: formatAmount(parseAmount(current.allocation) - parseAmount(current.spent)),
    };
  }

  /**
   * Daily window as seen at the current time. Read-only: a due rollover
   * is reported, not applied.
   */
  getDailyStatus(identity: string): DailyStatus {
    const budget = this.getUserBudget(identity);
    const limit = parseAmount(budget.dailyLimit);
    const spent = parseAmount(budget.dailySpent);
    return {
      dailyLimit: budget.dailyLimit,
      dailySpent: budget.dailySpent,
      remaining: formatAmount(spent >= limit ? 0n : limit - spent),
      lastResetAt: budget.lastResetAt,
      strictMode: budget.strictMode,
      rolloverPending: isRolloverDue(budget.lastResetAt, this.now()),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Take a ledger snapshot (for persistence by the host store).
   */
  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      budgets: [...this.budgets.values()],
      createdAt: this.now().toISOString(),
    };
  }

  /**
   * Restore from a snapshot.
   */
  static fromSnapshot(
    snapshot: LedgerSnapshot,
    options: BudgetLedgerOptions = {},
  ): BudgetLedger {
    const ledger = new BudgetLedger(options);
    for (const budget of snapshot.budgets) {
      ledger.budgets.set(budget.identity, budget);
    }
    return ledger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  private commit(budget: UserBudget, changes: Partial<UserBudget>): UserBudget {
    const updated: UserBudget = { ...budget, ...changes };
    this.budgets.set(budget.identity, updated);
    return updated;
  }

  /**
   * Commit a spend and hand its record to the sink. If the sink throws,
   * the prior budget is put back before the error propagates.
   */
  private commitSpend(
    prior: UserBudget,
    changes: Partial<UserBudget>,
    record: SpendRecord,
  ): SpendRecord {
    this.commit(prior, changes);
    try {
      this.sink?.record(record);
    } catch (err) {
      this.budgets.set(prior.identity, prior);
      throw err;
    }
    return record;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function emptyCategory(name: CategoryName, allocation: bigint): Category {
  return {
    name,
    allocation: formatAmount(allocation),
    spent: "0",
    subDivisions: {},
    subDivisionOrder: [],
  };
}

function ownSubDivision(category: Category, name: string): SubDivision | undefined {
  return Object.hasOwn(category.subDivisions, name)
    ? category.subDivisions[name]
    : undefined;
}

/**
 * Sum of sub-division allocations, excluding the entry `replacing` would overwrite.
 */
function reservedAllocation(category: Category, replacing: string): bigint {
  return sumAmounts(
    Object.entries(category.subDivisions)
      .filter(([name]) => name !== replacing)
      .map(([, sub]) => sub.allocation),
  );
}

function categoryAmounts(
  budget: UserBudget,
  pick: (category: Category) => bigint,
): CategoryAmounts {
  return {
    Needs: pick(budget.categories.Needs),
    Wants: pick(budget.categories.Wants),
    Savings: pick(budget.categories.Savings),
  };
}

function assertIdentity(identity: string): void {
  if (identity.length === 0) {
    throw new BudgetError("INVALID_IDENTITY", "Identity must be a non-empty string");
  }
}

function assertCategoryLabel(category: string): void {
  if (category.length === 0) {
    throw new BudgetError("INVALID_CATEGORY", "Category must be a non-empty string");
  }
}

function rejectZeroAllocation(category: string): never {
  throw new BudgetError(
    "DIVIDE_BY_ZERO",
    `Category '${category}' has no allocation to divide`,
  );
}

function exceedsCategory(category: string, requested: bigint, available: bigint): BudgetError {
  return new BudgetError(
    "EXCEEDS_CATEGORY_BUDGET",
    `Sub-division amount ${formatAmount(requested)} exceeds '${category}' allocation ${formatAmount(available)}`,
  );
}

function insufficient(target: string, requested: bigint, available: bigint): BudgetError {
  return new BudgetError(
    "INSUFFICIENT_FUNDS",
    `Insufficient funds in '${target}': need ${formatAmount(requested)}, available ${formatAmount(available)}`,
  );
}
