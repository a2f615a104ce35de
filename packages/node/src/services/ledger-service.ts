/**
 * LedgerService — composition root for the budget engine.
 *
 * Route handlers delegate to this service; they never import the
 * engine directly. The service owns one BudgetLedger whose spend sink
 * appends to the event store, and logs every spend outcome.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { BudgetError, BudgetLedger } from "@allotment/budget";
import type {
  GeneralSpendRecord,
  LedgerPolicy,
  SpendEventSink,
} from "@allotment/budget";
import {
  budgetStreamId,
  createSpendRecordedEvent,
  readSpendRecorded,
} from "@allotment/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  SpendRecordedPayload,
} from "@allotment/event-store";
import { GENERAL_POOL } from "@allotment/types";
import type {
  Amount,
  BudgetSummary,
  CategoryView,
  DailyStatus,
  SpendRecord,
  SubDivisionView,
} from "@allotment/types";

// =============================================================================
// Configuration
// =============================================================================

export interface LedgerServiceConfig {
  readonly eventStore: EventStore;
  readonly logger: Logger;
  readonly policy?: Partial<LedgerPolicy> | undefined;
  readonly now?: (() => Date) | undefined;
}

/**
 * Who is acting, and under which request.
 */
export interface RequestContext {
  readonly identity: string;
  readonly requestId: string;
}

/**
 * A spend as listed by the events endpoint.
 */
export interface SpendEventView {
  readonly eventId: string;
  readonly version: number;
  readonly globalPosition: number;
  readonly correlationId: string;
  readonly spend: SpendRecordedPayload;
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  readonly ledger: BudgetLedger;
  readonly eventStore: EventStore;

  private readonly _logger: Logger;

  /** Correlation ID of the spend in progress; operations are synchronous */
  private _correlationId: string | undefined;

  constructor(config: LedgerServiceConfig) {
    this.eventStore = config.eventStore;
    this._logger = config.logger;

    const sink: SpendEventSink = {
      record: (spend) => {
        this.eventStore.append(budgetStreamId(spend.identity), [
          createSpendRecordedEvent(spend, {
            eventId: randomUUID(),
            correlationId: this._correlationId ?? randomUUID(),
          }),
        ]);
      },
    };

    this.ledger = new BudgetLedger({ policy: config.policy, now: config.now, sink });
  }

  // ─── Setup ──────────────────────────────────────────────────────────

  initializeBudget(ctx: RequestContext, income: Amount): BudgetSummary {
    this.ledger.initializeBudget(ctx.identity, income);
    this._logger.info({ identity: ctx.identity, requestId: ctx.requestId }, "Budget initialized");
    return this.ledger.getBudgetSummary(ctx.identity);
  }

  addSubDivision(
    ctx: RequestContext,
    category: string,
    name: string,
    amount: Amount,
  ): SubDivisionView {
    const sub = this.ledger.addSubDivision(ctx.identity, category, name, amount);
    return {
      name: sub.name,
      allocation: sub.allocation,
      percentOfCategory: sub.percentOfCategory,
      spent: sub.spent,
    };
  }

  setStrictMode(ctx: RequestContext, enabled: boolean): DailyStatus {
    this.ledger.toggleStrictMode(ctx.identity, enabled);
    this._logger.info(
      { identity: ctx.identity, requestId: ctx.requestId, strictMode: enabled },
      "Strict mode changed",
    );
    return this.ledger.getDailyStatus(ctx.identity);
  }

  // ─── Spending ───────────────────────────────────────────────────────

  spendFromSubDivision(
    ctx: RequestContext,
    category: string,
    name: string,
    amount: Amount,
  ): SpendRecord {
    return this._spend(ctx, { category, subDivision: name, amount }, () =>
      this.ledger.spendFromSubDivision(ctx.identity, category, name, amount),
    );
  }

  spendFromCategory(ctx: RequestContext, category: string, amount: Amount): SpendRecord {
    return this._spend(ctx, { category, amount }, () =>
      this.ledger.spendFromCategory(ctx.identity, category, amount),
    );
  }

  spendFromGeneral(ctx: RequestContext, amount: Amount): GeneralSpendRecord {
    return this._spend(ctx, { category: GENERAL_POOL, amount }, () =>
      this.ledger.spendFromGeneral(ctx.identity, amount),
    );
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getBudgetSummary(identity: string): BudgetSummary {
    return this.ledger.getBudgetSummary(identity);
  }

  getDailyStatus(identity: string): DailyStatus {
    return this.ledger.getDailyStatus(identity);
  }

  getCategory(identity: string, category: string): CategoryView {
    return this.ledger.getCategory(identity, category);
  }

  getSubDivisions(identity: string, category: string): readonly SubDivisionView[] {
    return this.ledger.getSubDivisions(identity, category);
  }

  identityCount(): number {
    return this.ledger.listIdentities().length;
  }

  /**
   * The identity's recorded spends in stream order.
   */
  listSpendEvents(identity: string): readonly SpendEventView[] {
    const views: SpendEventView[] = [];
    for (const stored of this.eventStore.read(budgetStreamId(identity))) {
      const spend = readSpendRecorded(stored);
      if (spend !== undefined) {
        views.push({
          eventId: stored.event.metadata.eventId,
          version: stored.version,
          globalPosition: stored.globalPosition,
          correlationId: stored.event.metadata.correlationId,
          spend,
        });
      }
    }
    return views;
  }

  // ─── Health ─────────────────────────────────────────────────────────

  verifyEventLog(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _spend<T extends SpendRecord>(
    ctx: RequestContext,
    target: { readonly category: string; readonly subDivision?: string; readonly amount: Amount },
    run: () => T,
  ): T {
    const fields = { identity: ctx.identity, requestId: ctx.requestId, ...target };
    this._correlationId = ctx.requestId;
    try {
      const record = run();
      this._logger.debug(fields, "Spend recorded");
      return record;
    } catch (err) {
      if (err instanceof BudgetError) {
        this._logger.info({ ...fields, code: err.code }, "Spend rejected");
      }
      throw err;
    } finally {
      this._correlationId = undefined;
    }
  }
}
