/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, statusForCode } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { identityMiddleware, DEFAULT_IDENTITY_HEADER } from "./identity.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  REPLAY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
export { computeETag, checkIfMatch, jsonWithETag } from "./etag.js";
