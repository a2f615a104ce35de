/**
 * ETag utilities for budget read models.
 *
 * GET handlers tag their payload and honour If-None-Match; state
 * changes can be made conditional on If-Match.
 */

import { createHash } from "node:crypto";
import type { Context } from "hono";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Compute an ETag for a JSON-serializable object.
 */
export function computeETag(obj: unknown): string {
  const json = JSON.stringify(obj);
  const hash = createHash("sha256").update(json).digest("hex").slice(0, 16);
  return `"${hash}"`;
}

/**
 * Check If-Match against the entity's current ETag.
 * Returns a 412 response on mismatch, or undefined to continue.
 */
export function checkIfMatch(
  c: Context,
  entity: unknown,
): Response | undefined {
  const ifMatch = c.req.header("If-Match");
  if (ifMatch === undefined) {
    return undefined;
  }

  const currentETag = computeETag(entity);
  if (ifMatch !== currentETag) {
    return c.json(
      createErrorEnvelope(
        "PRECONDITION_FAILED",
        "If-Match header does not match current entity state",
        { currentETag },
      ),
      412,
    );
  }

  return undefined;
}

/**
 * Respond with `{ data }` tagged by its ETag, or 304 when the client's
 * If-None-Match already names it.
 */
export function jsonWithETag(c: Context, data: unknown): Response {
  const etag = computeETag(data);
  c.header("ETag", etag);

  if (c.req.header("If-None-Match") === etag) {
    return c.body(null, 304);
  }
  return c.json({ data });
}
