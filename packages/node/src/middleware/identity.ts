/**
 * Identity middleware.
 *
 * The caller's identity is asserted by a trusted upstream through a
 * configurable header. Requests without it are rejected with 400.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const DEFAULT_IDENTITY_HEADER = "X-Identity-Id";

export function identityMiddleware(
  headerName: string = DEFAULT_IDENTITY_HEADER,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const identity = c.req.header(headerName)?.trim() ?? "";
    if (identity.length === 0) {
      return c.json(
        createErrorEnvelope("MISSING_IDENTITY", `Missing ${headerName} header`),
        400,
      );
    }

    c.set("identity", identity);
    await next();
  };
}
