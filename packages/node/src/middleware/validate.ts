/**
 * Zod validation middleware.
 *
 * Validates the JSON request body against a Zod schema.
 * Returns 400 with an error envelope on failure.
 */

import { createMiddleware } from "hono/factory";
import type { z, ZodError } from "zod";
import { createErrorEnvelope } from "../types/error.js";

/**
 * On success, sets the parsed body as `validatedBody`.
 */
export function validateBody<S extends z.ZodTypeAny>(schema: S) {
  return createMiddleware<{ Variables: { validatedBody: z.output<S> } }>(
    async (c, next) => {
      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
          400,
        );
      }

      const result = schema.safeParse(body);
      if (!result.success) {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
            issues: formatZodErrors(result.error),
          }),
          400,
        );
      }

      c.set("validatedBody", result.data);
      await next();
    },
  );
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
