/**
 * In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for tests, development and
 * short-lived processes; all state is lost on exit.
 *
 * Also the base of JsonlEventStore: subclasses persist through
 * `persist()` and rebuild state through `restore()`.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch
 */

import type { DomainEvent } from "@allotment/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  EventStoreOptions,
  ExpectedVersion,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, HashedStoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: HashedStoredEvent[] = [];

  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();

  private _nextGlobalPosition = 1;

  /** Hash of the last stored event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  private readonly _now: () => Date;

  constructor(options: EventStoreOptions = {}) {
    this._now = options.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    const fromVersion = currentVersion + 1;
    const appendedAt = this._now().toISOString();
    const stored: HashedStoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, i) => {
      const base = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition + i,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      stored.push({ ...base, hash, previousHash });
      previousHash = hash;
    });

    // Durable write first; in-memory state changes only if it succeeds
    this.persist(stored);
    for (const event of stored) {
      this.restore(event);
    }

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const result = options?.direction === "backward"
      ? stream.filter((e) => e.version <= fromVersion).reverse()
      : stream.filter((e) => e.version >= fromVersion);

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    const result = options?.direction === "backward"
      ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
      : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Extension points ───────────────────────────────────────────────

  /**
   * Write a batch durably before it becomes visible. No-op in memory.
   */
  protected persist(_events: readonly HashedStoredEvent[]): void {}

  /**
   * Index one already-persisted event.
   */
  protected restore(event: HashedStoredEvent): void {
    let stream = this._streams.get(event.streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(event.streamId, stream);
    }
    stream.push(event);
    this._globalLog.push(event);
    this._lastHash = event.hash;

    if (event.globalPosition >= this._nextGlobalPosition) {
      this._nextGlobalPosition = event.globalPosition + 1;
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expected: ExpectedVersion | undefined,
  ): void {
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
          streamId,
        );
      }
      return;
    }
    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly HashedStoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    if (streamSubs !== undefined) {
      for (const handler of streamSubs) {
        for (const event of events) {
          handler(event);
        }
      }
    }

    for (const handler of this._globalSubscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}

function limit<T>(events: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
