/**
 * @allotment/sdk — Typed HTTP client SDK for the Allotment budget API.
 *
 * @packageDocumentation
 */

// Types
export type {
  AllotmentClientConfig,
  AllotmentResponse,
  FetchFn,
  GeneralSpend,
  ListEventsParams,
  PaginatedList,
  RequestOptions,
  SpendEvent,
} from "./types.js";

export { AllotmentError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";

// Client
export { AllotmentClient, BudgetNamespace, EventsNamespace } from "./client.js";
