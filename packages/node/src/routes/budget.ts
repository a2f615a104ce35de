/**
 * Budget routes. Every route acts on the caller's own budget.
 *
 * POST /api/v1/budget                                                — Initialize (201)
 * GET  /api/v1/budget                                                — Allocation summary
 * GET  /api/v1/budget/daily                                          — Daily window status
 * PUT  /api/v1/budget/strict-mode                                    — Enable / disable the daily cap
 * POST /api/v1/budget/spend                                          — Spend from the general pool
 * GET  /api/v1/budget/categories/:category                           — Category balance
 * GET  /api/v1/budget/categories/:category/subdivisions              — List sub-divisions
 * POST /api/v1/budget/categories/:category/subdivisions              — Add a sub-division (201)
 * POST /api/v1/budget/categories/:category/spend                     — Spend from a category
 * POST /api/v1/budget/categories/:category/subdivisions/:name/spend  — Spend from a sub-division
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddSubDivisionSchema,
  InitializeBudgetSchema,
  SpendSchema,
  StrictModeSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { checkIfMatch, jsonWithETag } from "../middleware/etag.js";

export function createBudgetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Budget ──────────────────────────────────────────────────────

  routes.post("/", validateBody(InitializeBudgetSchema), (c) => {
    const ctx = { identity: c.get("identity"), requestId: c.get("requestId") };
    const { income } = c.get("validatedBody");
    return c.json({ data: c.get("service").initializeBudget(ctx, income) }, 201);
  });

  routes.get("/", (c) => {
    return jsonWithETag(c, c.get("service").getBudgetSummary(c.get("identity")));
  });

  routes.get("/daily", (c) => {
    return jsonWithETag(c, c.get("service").getDailyStatus(c.get("identity")));
  });

  routes.put("/strict-mode", validateBody(StrictModeSchema), (c) => {
    const ctx = { identity: c.get("identity"), requestId: c.get("requestId") };
    const service = c.get("service");
    const { enabled } = c.get("validatedBody");

    const precondition = checkIfMatch(c, service.getDailyStatus(ctx.identity));
    if (precondition !== undefined) {
      return precondition;
    }

    return c.json({ data: service.setStrictMode(ctx, enabled) });
  });

  routes.post("/spend", validateBody(SpendSchema), (c) => {
    const ctx = { identity: c.get("identity"), requestId: c.get("requestId") };
    const { amount } = c.get("validatedBody");
    return c.json({ data: c.get("service").spendFromGeneral(ctx, amount) });
  });

  // ─── Categories ──────────────────────────────────────────────────

  routes.get("/categories/:category", (c) => {
    const category = c.req.param("category");
    return jsonWithETag(c, c.get("service").getCategory(c.get("identity"), category));
  });

  routes.post("/categories/:category/spend", validateBody(SpendSchema), (c) => {
    const ctx = { identity: c.get("identity"), requestId: c.get("requestId") };
    const category = c.req.param("category");
    const { amount } = c.get("validatedBody");
    return c.json({ data: c.get("service").spendFromCategory(ctx, category, amount) });
  });

  // ─── Sub-divisions ───────────────────────────────────────────────

  routes.get("/categories/:category/subdivisions", (c) => {
    const category = c.req.param("category");
    return jsonWithETag(c, c.get("service").getSubDivisions(c.get("identity"), category));
  });

  routes.post(
    "/categories/:category/subdivisions",
    validateBody(AddSubDivisionSchema),
    (c) => {
      const ctx = { identity: c.get("identity"), requestId: c.get("requestId") };
      const category = c.req.param("category");
      const { name, amount } = c.get("validatedBody");
      return c.json({ data: c.get("service").addSubDivision(ctx, category, name, amount) }, 201);
    },
  );

  routes.post(
    "/categories/:category/subdivisions/:name/spend",
    validateBody(SpendSchema),
    (c) => {
      const ctx = { identity: c.get("identity"), requestId: c.get("requestId") };
      const category = c.req.param("category");
      const name = c.req.param("name");
      const { amount } = c.get("validatedBody");
      return c.json({
        data: c.get("service").spendFromSubDivision(ctx, category, name, amount),
      });
    },
  );

  return routes;
}
