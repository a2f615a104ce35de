/**
 * Idempotency middleware.
 *
 * Caches successful POST responses by Idempotency-Key, scoped to the
 * caller's identity. A repeated key within the TTL replays the cached
 * response instead of re-executing the handler. While the first request
 * with a key is still running, a duplicate is answered with 409
 * IDEMPOTENCY_CONFLICT.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  /** Cache a response; also ends the key's in-flight claim */
  set(key: string, response: CachedResponse): void;
  /** Claim a key for a running request. False if already claimed. */
  claim(key: string): boolean;
  release(key: string): void;
  stamp(): number;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _inFlight = new Set<string>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs: number = 86400000, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  /** Start of a new entry's TTL */
  stamp(): number {
    return this._now();
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this._now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  set(key: string, response: CachedResponse): void {
    this._inFlight.delete(key);
    this._cache.delete(key);
    this._cache.set(key, response);
    this._evictExpired();
  }

  claim(key: string): boolean {
    if (this._inFlight.has(key)) {
      return false;
    }
    this._inFlight.add(key);
    return true;
  }

  release(key: string): void {
    this._inFlight.delete(key);
  }

  get size(): number {
    return this._cache.size;
  }

  /** Entries are in cachedAt order, so expired ones sit at the front */
  private _evictExpired(): void {
    const cutoff = this._now() - this._ttlMs;
    for (const [key, entry] of this._cache) {
      if (entry.cachedAt >= cutoff) {
        break;
      }
      this._cache.delete(key);
    }
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

const MAX_KEY_LENGTH = 256;

/**
 * Must run after the identity middleware.
 */
export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }
    if (idempotencyKey.length === 0 || idempotencyKey.length > MAX_KEY_LENGTH) {
      return c.json(
        createErrorEnvelope(
          "VALIDATION_ERROR",
          `${IDEMPOTENCY_HEADER} must be 1-${MAX_KEY_LENGTH} characters`,
        ),
        400,
      );
    }

    const scopedKey = `${c.get("identity")}\u0000${idempotencyKey}`;
    const cached = store.get(scopedKey);
    if (cached !== undefined) {
      const headers = new Headers(cached.headers);
      headers.set(REPLAY_HEADER, "true");
      return new Response(cached.body, { status: cached.status, headers });
    }

    if (!store.claim(scopedKey)) {
      return c.json(
        createErrorEnvelope(
          "IDEMPOTENCY_CONFLICT",
          `A request with this ${IDEMPOTENCY_HEADER} is still in progress`,
        ),
        409,
      );
    }

    let cachedResponse = false;
    try {
      await next();

      if (c.res.status < 400) {
        const cloned = c.res.clone();
        const headers: Record<string, string> = {};
        cloned.headers.forEach((value, key) => {
          headers[key] = value;
        });

        store.set(scopedKey, {
          status: cloned.status,
          body: await cloned.text(),
          headers,
          cachedAt: store.stamp(),
        });
        cachedResponse = true;
      }
    } finally {
      if (!cachedResponse) {
        store.release(scopedKey);
      }
    }
  };
}
