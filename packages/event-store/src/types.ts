/**
 * Event store core types.
 *
 * Append-only persistence for domain events.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a contiguous version within its stream
 * - Concurrency control via expected version (optimistic locking)
 * - Every stored event is linked into one global hash chain
 */

import type { DomainEvent } from "@allotment/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: position within the stream (1-based)
 * - globalPosition: position across all streams (1-based)
 */
export interface StoredEvent {
  readonly event: DomainEvent;
  readonly streamId: string;
  readonly version: number;
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A stored event carrying its link in the hash chain.
 */
export interface HashedStoredEvent extends StoredEvent {
  /** SHA-256 over the canonical event plus previousHash */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;
}

export function isHashedEvent(event: StoredEvent): event is HashedStoredEvent {
  return "hash" in event
    && typeof event.hash === "string"
    && "previousHash" in event
    && typeof event.previousHash === "string";
}

// =============================================================================
// Append / Read Options
// =============================================================================

/**
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist (first write)
 * - "any": no concurrency check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

/**
 * Construction options shared by every store implementation.
 */
export interface EventStoreOptions {
  /** Clock for appendedAt. Default: () => new Date() */
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: HashedStoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose hash was checked */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - Subscribers see events in order, after they are stored
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError if the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream; empty if the stream doesn't exist */
  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[];

  /** Events across all streams in global order */
  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;
  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event, or 0 if the stream doesn't exist */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty */
  globalPosition(): number;

  /** Recompute the hash chain over every stored event */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
