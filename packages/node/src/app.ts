/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { LedgerService } from "./services/ledger-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { identityMiddleware } from "./middleware/identity.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { createHealthRoutes } from "./routes/health.js";
import { createBudgetRoutes } from "./routes/budget.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: LedgerService;
  /** Request logger. When omitted, requests are not logged. */
  readonly logger?: Logger | undefined;
  /** Header carrying the caller's identity. Default: X-Identity-Id */
  readonly identityHeader?: string | undefined;
  readonly idempotencyTtlMs?: number | undefined;
  /** Clock for idempotency expiry (epoch ms) */
  readonly now?: (() => number) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LedgerService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
    options.now ?? Date.now,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));

  // ─── Health Routes (no identity required) ───────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  // identity → idempotency (replays are scoped to the identity)
  app.use("/api/*", identityMiddleware(options.identityHeader));
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  app.route("/api/v1/budget", createBudgetRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service, idempotencyStore };
}
