/**
 * Daily-limit enforcement.
 *
 * Pure functions over a budget's daily window. The caller commits the
 * returned state only once every other check of the operation passed.
 */

import { formatAmount, parseAmount } from "./amount.js";
import type { LedgerPolicy, UserBudget } from "./types.js";
import { BudgetError, DAY_MS } from "./types.js";

export type DailyWindowState = Pick<
  UserBudget,
  "dailyLimit" | "dailySpent" | "lastResetAt" | "strictMode"
>;

export interface DailyWindowCharge {
  readonly dailySpent: string;
  readonly lastResetAt: string;
}

/**
 * A window rolls over once `now` is strictly later than one day after
 * its start. It rolls over once no matter how many days elapsed.
 */
export function isRolloverDue(lastResetAt: string, now: Date): boolean {
  return now.getTime() > Date.parse(lastResetAt) + DAY_MS;
}

/**
 * Charge `amount` against the daily window.
 *
 * @throws BudgetError DAILY_LIMIT_EXCEEDED in strict mode when the
 *   window (after any rollover) cannot absorb the amount
 */
export function chargeDailyWindow(
  window: DailyWindowState,
  amount: bigint,
  now: Date,
  tracking: LedgerPolicy["lenientDailyTracking"],
): DailyWindowCharge {
  const spent = parseAmount(window.dailySpent);

  if (!window.strictMode) {
    return {
      dailySpent: tracking === "accumulate" ? formatAmount(spent + amount) : window.dailySpent,
      lastResetAt: window.lastResetAt,
    };
  }

  let current = spent;
  let lastResetAt = window.lastResetAt;
  if (isRolloverDue(window.lastResetAt, now)) {
    current = 0n;
    lastResetAt = now.toISOString();
  }

  const limit = parseAmount(window.dailyLimit);
  if (current + amount > limit) {
    throw new BudgetError(
      "DAILY_LIMIT_EXCEEDED",
      `Daily limit exceeded: spent ${formatAmount(current)} of ${window.dailyLimit}, requested ${formatAmount(amount)}`,
    );
  }

  return { dailySpent: formatAmount(current + amount), lastResetAt };
}
