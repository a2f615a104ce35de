/**
 * @allotment/sdk — Allotment Client.
 *
 * Main entry point for the Allotment SDK.
 *
 * Provides typed methods for:
 * - Budget setup (initialize, sub-divisions, strict mode)
 * - Spending (sub-division, category, general pool)
 * - Queries (summary, daily status, categories)
 * - The caller's spend event history
 *
 * Every call acts as the identity the client was configured with.
 */

import type {
  BudgetSummary,
  CategoryView,
  DailyStatus,
  SpendRecord,
  SubDivisionView,
} from "@allotment/types";
import type {
  AllotmentClientConfig,
  AllotmentResponse,
  GeneralSpend,
  ListEventsParams,
  PaginatedList,
  RequestOptions,
  SpendEvent,
} from "./types.js";
import { Envelopes, EventPageSchema } from "./types.js";
import { HttpClient } from "./http-client.js";

function unwrap<T>(result: AllotmentResponse<{ data: T }>): AllotmentResponse<T> {
  return { data: result.data.data, status: result.status, headers: result.headers };
}

function categoryPath(category: string): string {
  return `/api/v1/budget/categories/${encodeURIComponent(category)}`;
}

// =============================================================================
// Namespace Classes
// =============================================================================

/**
 * Budget operations namespace.
 */
export class BudgetNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Create (or, by server policy, replace) the caller's budget.
   */
  async initialize(income: string, options?: RequestOptions): Promise<AllotmentResponse<BudgetSummary>> {
    return unwrap(await this.http.post("/api/v1/budget", { income }, Envelopes.summary, options));
  }

  async summary(): Promise<AllotmentResponse<BudgetSummary>> {
    return unwrap(await this.http.get("/api/v1/budget", Envelopes.summary));
  }

  async daily(): Promise<AllotmentResponse<DailyStatus>> {
    return unwrap(await this.http.get("/api/v1/budget/daily", Envelopes.daily));
  }

  /**
   * Turn daily-limit enforcement on or off. Pass the daily status
   * ETag as `ifMatch` to make the change conditional.
   */
  async setStrictMode(enabled: boolean, options?: RequestOptions): Promise<AllotmentResponse<DailyStatus>> {
    return unwrap(
      await this.http.put("/api/v1/budget/strict-mode", { enabled }, Envelopes.daily, options),
    );
  }

  async category(category: string): Promise<AllotmentResponse<CategoryView>> {
    return unwrap(await this.http.get(categoryPath(category), Envelopes.category));
  }

  async subDivisions(category: string): Promise<AllotmentResponse<readonly SubDivisionView[]>> {
    return unwrap(await this.http.get(`${categoryPath(category)}/subdivisions`, Envelopes.subDivisions));
  }

  async addSubDivision(
    category: string,
    name: string,
    amount: string,
    options?: RequestOptions,
  ): Promise<AllotmentResponse<SubDivisionView>> {
    return unwrap(
      await this.http.post(
        `${categoryPath(category)}/subdivisions`,
        { name, amount },
        Envelopes.subDivision,
        options,
      ),
    );
  }

  async spendFromSubDivision(
    category: string,
    name: string,
    amount: string,
    options?: RequestOptions,
  ): Promise<AllotmentResponse<SpendRecord>> {
    return unwrap(
      await this.http.post(
        `${categoryPath(category)}/subdivisions/${encodeURIComponent(name)}/spend`,
        { amount },
        Envelopes.spend,
        options,
      ),
    );
  }

  async spendFromCategory(
    category: string,
    amount: string,
    options?: RequestOptions,
  ): Promise<AllotmentResponse<SpendRecord>> {
    return unwrap(
      await this.http.post(`${categoryPath(category)}/spend`, { amount }, Envelopes.spend, options),
    );
  }

  /**
   * Spend from the whole budget; the result carries each category's share.
   */
  async spendFromGeneral(amount: string, options?: RequestOptions): Promise<AllotmentResponse<GeneralSpend>> {
    return unwrap(
      await this.http.post("/api/v1/budget/spend", { amount }, Envelopes.generalSpend, options),
    );
  }
}

/**
 * Spend event history namespace.
 */
export class EventsNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * List the caller's recorded spends with cursor pagination.
   */
  async list(params?: ListEventsParams): Promise<AllotmentResponse<PaginatedList<SpendEvent>>> {
    const query = new URLSearchParams();
    if (params?.cursor !== undefined) query.set("cursor", params.cursor);
    if (params?.limit !== undefined) query.set("limit", String(params.limit));

    const qs = query.toString();
    const path = qs.length > 0 ? `/api/v1/events?${qs}` : "/api/v1/events";

    return this.http.get(path, EventPageSchema);
  }
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Allotment SDK client — main entry point.
 *
 * Usage:
 * ```typescript
 * const client = new AllotmentClient({
 *   baseUrl: "http://localhost:3000",
 *   identity: "alice",
 * });
 *
 * await client.budget.initialize("300000");
 * await client.budget.addSubDivision("Needs", "Groceries", "30000");
 * const spend = await client.budget.spendFromSubDivision("Needs", "Groceries", "1250");
 * ```
 */
export class AllotmentClient {
  /** Budget setup, spending and queries. */
  readonly budget: BudgetNamespace;
  /** Spend event history. */
  readonly events: EventsNamespace;

  constructor(config: AllotmentClientConfig) {
    const http = new HttpClient(config);
    this.budget = new BudgetNamespace(http);
    this.events = new EventsNamespace(http);
  }
}
