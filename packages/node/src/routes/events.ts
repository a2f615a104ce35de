/**
 * Event query routes.
 *
 * GET /api/v1/events — The caller's recorded spends (cursor pagination by version)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const result = paginate(
      service.listSpendEvents(c.get("identity")),
      { cursor: query.cursor, limit: query.limit },
      (e) => e.version,
      "version",
    );

    if (result === undefined) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid cursor"), 400);
    }
    return c.json(result);
  });

  return routes;
}
