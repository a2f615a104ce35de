/**
 * @allotment/sdk — SDK types.
 *
 * Types specific to the SDK client layer, plus the zod schemas the
 * client checks every response body against.
 */

import { z } from "zod";
import type {
  BudgetSummary,
  CategoryView,
  DailyStatus,
  SpendRecord,
  SubDivisionView,
} from "@allotment/types";

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * The subset of fetch() the client calls.
 */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Configuration for the Allotment SDK client.
 */
export interface AllotmentClientConfig {
  /** Base URL of the Allotment API (e.g., "http://localhost:3000") */
  readonly baseUrl: string;
  /** Identity every request acts as */
  readonly identity: string;
  /** Header carrying the identity (default: "X-Identity-Id") */
  readonly identityHeader?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 3) */
  readonly retries?: number | undefined;
  /** First backoff delay; doubles per attempt, capped at 10s (default: 1000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: FetchFn | undefined;
}

/**
 * Per-call options for state-changing requests.
 */
export interface RequestOptions {
  /** Reuse a key to make a retried call safe; generated when omitted */
  readonly idempotencyKey?: string | undefined;
  /** Only apply the change while the resource still has this ETag */
  readonly ifMatch?: string | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * Standard Allotment API response envelope.
 */
export interface AllotmentResponse<T> {
  /** Response payload */
  readonly data: T;
  /** HTTP status code */
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Paginated list response.
 */
export interface PaginatedList<T> {
  /** Items in this page */
  readonly data: readonly T[];
  /** Pagination metadata */
  readonly pagination: {
    readonly cursor: string | null;
    readonly hasMore: boolean;
  };
}

/**
 * A recorded spend as listed by the events endpoint.
 */
export interface SpendEvent {
  readonly eventId: string;
  readonly version: number;
  readonly globalPosition: number;
  readonly correlationId: string;
  readonly spend: SpendRecord;
}

export interface GeneralSpend extends SpendRecord {
  readonly shares: Readonly<Record<"Needs" | "Wants" | "Savings", string>>;
}

export interface ListEventsParams {
  readonly cursor?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// Response Schemas
// =============================================================================

const AmountSchema = z.string().regex(/^-?\d+$/);

const CategoryNameSchema = z.enum(["Needs", "Wants", "Savings"]);

export const BudgetSummarySchema: z.ZodType<BudgetSummary> = z.object({
  income: AmountSchema,
  dailyLimit: AmountSchema,
  needsAllocation: AmountSchema,
  wantsAllocation: AmountSchema,
  savingsAllocation: AmountSchema,
});

export const DailyStatusSchema: z.ZodType<DailyStatus> = z.object({
  dailyLimit: AmountSchema,
  dailySpent: AmountSchema,
  remaining: AmountSchema,
  lastResetAt: z.string(),
  strictMode: z.boolean(),
  rolloverPending: z.boolean(),
});

export const CategoryViewSchema: z.ZodType<CategoryView> = z.object({
  name: CategoryNameSchema,
  allocation: AmountSchema,
  spent: AmountSchema,
  remaining: AmountSchema,
});

export const SubDivisionViewSchema: z.ZodType<SubDivisionView> = z.object({
  name: z.string(),
  allocation: AmountSchema,
  percentOfCategory: z.number().int(),
  spent: AmountSchema,
});

const SpendRecordObject = z.object({
  identity: z.string(),
  category: z.enum(["Needs", "Wants", "Savings", "General"]),
  subDivision: z.string(),
  amount: AmountSchema,
  timestamp: z.string(),
});

export const SpendRecordSchema: z.ZodType<SpendRecord> = SpendRecordObject;

export const GeneralSpendSchema: z.ZodType<GeneralSpend> = SpendRecordObject.extend({
  shares: z.object({ Needs: AmountSchema, Wants: AmountSchema, Savings: AmountSchema }),
});

export const SpendEventSchema: z.ZodType<SpendEvent> = z.object({
  eventId: z.string(),
  version: z.number().int(),
  globalPosition: z.number().int(),
  correlationId: z.string(),
  spend: SpendRecordObject,
});

export const EventPageSchema: z.ZodType<PaginatedList<SpendEvent>> = z.object({
  data: z.array(SpendEventSchema),
  pagination: z.object({ cursor: z.string().nullable(), hasMore: z.boolean() }),
});

/**
 * `{ data }` envelopes of the single-resource responses.
 */
export const Envelopes = {
  summary: z.object({ data: BudgetSummarySchema }),
  daily: z.object({ data: DailyStatusSchema }),
  category: z.object({ data: CategoryViewSchema }),
  subDivision: z.object({ data: SubDivisionViewSchema }),
  subDivisions: z.object({ data: z.array(SubDivisionViewSchema) }),
  spend: z.object({ data: SpendRecordSchema }),
  generalSpend: z.object({ data: GeneralSpendSchema }),
} as const;

export const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the Allotment API.
 */
export class AllotmentError extends Error {
  /** Error code from the API (e.g., "INSUFFICIENT_FUNDS", "VALIDATION_ERROR") */
  readonly code: string;
  /** HTTP status code (0 for network errors and timeouts) */
  readonly statusCode: number;
  /** Additional error details (validation errors, etc.) */
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "AllotmentError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
