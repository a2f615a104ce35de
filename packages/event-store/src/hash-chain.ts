/**
 * Hash chain for a tamper-evident event log.
 *
 * Each event is hashed with RFC 8785 (JCS) canonicalization + SHA-256,
 * chained to its predecessor:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Editing any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
} from "./types.js";
import { isHashedEvent } from "./types.js";

/**
 * `previousHash` of the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

/**
 * Canonical form of the persisted fields. Hash fields are excluded.
 */
function canonicalEventContent(event: StoredEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Hex-encoded SHA-256 of an event given its predecessor's hash.
 */
export function computeEventHash(
  event: StoredEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Verify the hash chain of events given in global position order.
 *
 * Every event must carry hash fields; the first must link to
 * GENESIS_HASH.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const event of events) {
    const position = event.globalPosition;

    if (!isHashedEvent(event)) {
      errors.push({
        position,
        reason: `Event at position ${position} is missing hash fields`,
      });
      continue;
    }

    if (event.previousHash !== previousHash) {
      errors.push({
        position,
        reason: `previousHash mismatch at position ${position}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position,
        reason: `Hash mismatch at position ${position}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    previousHash = event.hash;
    lastVerifiedPosition = position;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
