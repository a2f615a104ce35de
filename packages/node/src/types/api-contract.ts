/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { LedgerService } from "../services/ledger-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Caller identity from the trusted identity header (set by identity middleware) */
    identity: string;

    /** The ledger service (set by the app factory) */
    service: LedgerService;
  };
}
