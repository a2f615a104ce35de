/**
 * Budget domain event definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`.
 * Each identity's spends go to its own stream, `budget-<identity>`.
 */

import type { DomainEvent, SpendRecord } from "@allotment/types";
import { isDomainEvent, isSpendRecord } from "@allotment/types";
import type { StoredEvent } from "./types.js";

export const BUDGET_EVENTS = {
  SPEND_RECORDED: "budget.spend.recorded",
} as const;

export type BudgetEventType = (typeof BUDGET_EVENTS)[keyof typeof BUDGET_EVENTS];

const STREAM_PREFIX = "budget-";

export type SpendRecordedPayload = Pick<SpendRecord, keyof SpendRecord>;

export function budgetStreamId(identity: string): string {
  return `${STREAM_PREFIX}${identity}`;
}

/**
 * Correlation fields supplied by the caller (typically from the request).
 */
export interface SpendEventContext {
  readonly eventId: string;
  readonly correlationId: string;
  readonly causationId?: string | undefined;
}

/**
 * Build the DomainEvent for a committed spend. The spend's identity is
 * the actor and its timestamp is the event timestamp.
 */
export function createSpendRecordedEvent(
  spend: SpendRecord,
  context: SpendEventContext,
): DomainEvent {
  const payload: SpendRecordedPayload = {
    identity: spend.identity,
    category: spend.category,
    subDivision: spend.subDivision,
    amount: spend.amount,
    timestamp: spend.timestamp,
  };

  return {
    type: BUDGET_EVENTS.SPEND_RECORDED,
    metadata: {
      eventId: context.eventId,
      timestamp: spend.timestamp,
      actor: spend.identity,
      correlationId: context.correlationId,
      source: "ledger",
      ...(context.causationId !== undefined ? { causationId: context.causationId } : {}),
    },
    payload,
  };
}

/**
 * The spend carried by a stored event, or undefined if it is not a
 * well-formed spend event.
 */
export function readSpendRecorded(stored: StoredEvent): SpendRecordedPayload | undefined {
  if (!isDomainEvent(stored.event) || stored.event.type !== BUDGET_EVENTS.SPEND_RECORDED) {
    return undefined;
  }
  return isSpendRecord(stored.event.payload) ? stored.event.payload : undefined;
}
