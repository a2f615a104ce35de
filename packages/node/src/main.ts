/**
 * @allotment/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { InMemoryEventStore, JsonlEventStore } from "@allotment/event-store";
import type { EventStore } from "@allotment/event-store";
import { loadConfig, policyFromConfig } from "./config.js";
import { createApp } from "./app.js";
import { LedgerService } from "./services/ledger-service.js";

// =============================================================================
// Bootstrap
// =============================================================================

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let eventStore: EventStore;
  if (config.EVENT_LOG_PATH !== undefined) {
    eventStore = new JsonlEventStore({ filePath: config.EVENT_LOG_PATH });
    logger.info(
      { path: config.EVENT_LOG_PATH, events: eventStore.globalPosition() },
      "Event log loaded",
    );
  } else {
    eventStore = new InMemoryEventStore();
    logger.warn("EVENT_LOG_PATH not set, spend events are kept in memory only");
  }

  const policy = policyFromConfig(config);
  const service = new LedgerService({ eventStore, logger, policy });

  const { app } = createApp({
    service,
    logger,
    identityHeader: config.IDENTITY_HEADER,
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, policy },
    "Allotment node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
