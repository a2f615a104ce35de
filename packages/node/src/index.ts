/**
 * @allotment/node — Public API.
 */

export { LedgerService } from "./services/ledger-service.js";
export type {
  LedgerServiceConfig,
  RequestContext,
  SpendEventView,
} from "./services/ledger-service.js";
export { loadConfig, policyFromConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./routes/index.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
