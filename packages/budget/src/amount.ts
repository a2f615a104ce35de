/**
 * @allotment/budget — Integer amount arithmetic.
 *
 * Amounts travel as non-negative integer strings and are converted
 * to bigint for every computation.
 *
 * Rules:
 * - No floating-point operations
 * - Division always floors
 * - Negative, fractional and non-numeric input is INVALID_AMOUNT
 */

import type { Amount } from "@allotment/types";
import { BudgetError } from "./types.js";

/**
 * Parse a non-negative integer amount.
 *
 * "1000" → 1000n
 * " 42 " → 42n
 */
export function parseAmount(amount: Amount, label = "Amount"): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new BudgetError("INVALID_AMOUNT", `${label} must be a non-empty string, got "${String(amount)}"`);
  }

  const trimmed = amount.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new BudgetError(
      "INVALID_AMOUNT",
      `${label} must be a non-negative integer, got "${trimmed}"`,
    );
  }

  return BigInt(trimmed);
}

/**
 * Parse an amount that must be strictly greater than zero.
 */
export function parsePositiveAmount(amount: Amount, label = "Amount"): bigint {
  const value = parseAmount(amount, label);
  if (value === 0n) {
    throw new BudgetError("INVALID_AMOUNT", `${label} must be positive, got "${amount.trim()}"`);
  }
  return value;
}

/**
 * Convert a bigint back to its string form. Negative values keep their sign;
 * they only appear in derived read models such as a category's remaining balance.
 */
export function formatAmount(value: bigint): Amount {
  return value.toString();
}

/**
 * floor(value * numerator / denominator)
 */
export function mulDiv(value: bigint, numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new BudgetError("DIVIDE_BY_ZERO", "Cannot divide by a zero amount");
  }
  return (value * numerator) / denominator;
}

/**
 * Add any number of string amounts.
 */
export function sumAmounts(amounts: readonly Amount[]): bigint {
  let total = 0n;
  for (const a of amounts) {
    total += parseAmount(a);
  }
  return total;
}
