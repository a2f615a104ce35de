/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if the server is running)
 * GET /ready  — Readiness probe (event log hash chain must verify)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const service = c.get("service");
    const integrity = service.verifyEventLog();

    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      identities: service.identityCount(),
      eventLog: {
        valid: integrity.valid,
        lastVerifiedPosition: integrity.lastVerifiedPosition,
        errors: integrity.errors.length,
      },
      timestamp: new Date().toISOString(),
    };

    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
