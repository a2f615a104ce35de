/**
 * Allocation arithmetic — income split, general-pool apportionment
 * and sub-division percentages.
 *
 * Both splits assign the rounding remainder to the last category
 * (Savings), so the parts always sum exactly to the whole.
 */

import type { CategoryName } from "@allotment/types";
import { mulDiv } from "./amount.js";
import {
  BudgetError,
  DAILY_LIMIT_DIVISOR,
  NEEDS_PERCENT,
  WANTS_PERCENT,
} from "./types.js";

export type CategoryAmounts = Readonly<Record<CategoryName, bigint>>;

/**
 * Split income 50 / 30 / remainder.
 *
 * 1000n → { Needs: 500n, Wants: 300n, Savings: 200n }
 * 7n    → { Needs: 3n, Wants: 2n, Savings: 2n }
 */
export function splitIncome(income: bigint): CategoryAmounts {
  const needs = mulDiv(income, NEEDS_PERCENT, 100n);
  const wants = mulDiv(income, WANTS_PERCENT, 100n);
  return {
    Needs: needs,
    Wants: wants,
    Savings: income - needs - wants,
  };
}

export function dailyLimitFor(income: bigint): bigint {
  return income / DAILY_LIMIT_DIVISOR;
}

/**
 * Apportion a general-pool amount by each category's allocation weight.
 *
 * needsShare = needs * amount / total
 * wantsShare = wants * amount / total
 * savingsShare = amount - needsShare - wantsShare
 */
export function apportion(amount: bigint, allocations: CategoryAmounts): CategoryAmounts {
  const total = allocations.Needs + allocations.Wants + allocations.Savings;
  if (total === 0n) {
    throw new BudgetError("DIVIDE_BY_ZERO", "Cannot apportion against a zero total allocation");
  }

  const needs = mulDiv(allocations.Needs, amount, total);
  const wants = mulDiv(allocations.Wants, amount, total);
  return {
    Needs: needs,
    Wants: wants,
    Savings: amount - needs - wants,
  };
}

/**
 * floor(part * 100 / whole) as a display percentage.
 */
export function percentOf(part: bigint, whole: bigint): number {
  if (whole === 0n) {
    throw new BudgetError(
      "DIVIDE_BY_ZERO",
      "Cannot compute a percentage of a zero-allocation category",
    );
  }
  return Number(mulDiv(part, 100n, whole));
}
