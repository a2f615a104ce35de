/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position
 * - Concurrency: expected version, no_stream, any
 * - Read / readAll: direction, from version, max count
 * - Subscriptions: stream-specific, global, unsubscribe
 * - Errors: empty append, invalid stream ID, invalid version
 */

import { describe, it, expect, vi } from "vitest";
import type { DomainEvent } from "@allotment/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const APPENDED_AT = new Date("2025-03-01T08:00:00.000Z");

function makeEvent(type: string, n = 0): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}-${n}`,
      timestamp: "2025-03-01T08:00:00.000Z",
      actor: "alice",
      correlationId: `corr-${n}`,
      source: "ledger",
    },
    payload: { n },
  };
}

function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`, i));
}

function createStore(): InMemoryEventStore {
  return new InMemoryEventStore({ now: () => APPENDED_AT });
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = createStore();
    const result = store.append("stream-1", [makeEvent("test.created")]);

    expect(result).toEqual({ streamId: "stream-1", fromVersion: 1, toVersion: 1, count: 1 });
  });

  it("assigns contiguous versions across appends", () => {
    const store = createStore();
    store.append("stream-1", makeEvents(2));
    const result = store.append("stream-1", makeEvents(3));

    expect(result).toEqual({ streamId: "stream-1", fromVersion: 3, toVersion: 5, count: 3 });
    expect(store.read("stream-1").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns global positions across streams", () => {
    const store = createStore();
    store.append("a", makeEvents(2));
    store.append("b", makeEvents(1));

    expect(store.readAll().map((e) => [e.streamId, e.globalPosition])).toEqual([
      ["a", 1],
      ["a", 2],
      ["b", 3],
    ]);
    expect(store.globalPosition()).toBe(3);
  });

  it("stamps appendedAt from the clock", () => {
    const store = createStore();
    store.append("s", [makeEvent("x")]);
    expect(store.read("s")[0]?.appendedAt).toBe("2025-03-01T08:00:00.000Z");
  });

  it("rejects an empty batch", () => {
    const store = createStore();
    expect(() => store.append("s", [])).toThrow(EventStoreError);
    expect(() => store.append("s", [])).toThrow("Cannot append zero events");
  });

  it("rejects an empty stream ID", () => {
    const store = createStore();
    expect(() => store.append("", [makeEvent("x")])).toThrow(
      "Stream ID must be a non-empty string",
    );
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("expectedVersion", () => {
  it("accepts a matching version", () => {
    const store = createStore();
    store.append("s", makeEvents(2));
    expect(store.append("s", [makeEvent("x")], { expectedVersion: 2 }).toVersion).toBe(3);
  });

  it("rejects a stale version", () => {
    const store = createStore();
    store.append("s", makeEvents(2));

    try {
      store.append("s", [makeEvent("x")], { expectedVersion: 1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      expect(err).toMatchObject({ code: "CONCURRENCY_CONFLICT", streamId: "s" });
    }
    expect(store.streamVersion("s")).toBe(2);
  });

  it("enforces no_stream", () => {
    const store = createStore();
    store.append("s", [makeEvent("x")], { expectedVersion: "no_stream" });
    expect(() =>
      store.append("s", [makeEvent("y")], { expectedVersion: "no_stream" }),
    ).toThrow('Stream "s" already exists (version 1), expected no_stream');
  });

  it("skips the check for any", () => {
    const store = createStore();
    store.append("s", [makeEvent("x")]);
    expect(store.append("s", [makeEvent("y")], { expectedVersion: "any" }).toVersion).toBe(2);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty list for a missing stream", () => {
    expect(createStore().read("missing")).toEqual([]);
  });

  it("reads from a version forward with a limit", () => {
    const store = createStore();
    store.append("s", makeEvents(5));
    expect(store.read("s", { fromVersion: 2, maxCount: 2 }).map((e) => e.version)).toEqual([2, 3]);
  });

  it("reads backward from a version", () => {
    const store = createStore();
    store.append("s", makeEvents(5));
    expect(store.read("s", { fromVersion: 3, direction: "backward" }).map((e) => e.version))
      .toEqual([3, 2, 1]);
  });

  it("rejects fromVersion below 1", () => {
    const store = createStore();
    expect(() => store.read("s", { fromVersion: 0 })).toThrow("fromVersion must be >= 1, got 0");
  });

  it("reads all events backward with a limit", () => {
    const store = createStore();
    store.append("a", makeEvents(2));
    store.append("b", makeEvents(2));
    expect(
      store.readAll({ fromPosition: 4, direction: "backward", maxCount: 3 })
        .map((e) => e.globalPosition),
    ).toEqual([4, 3, 2]);
  });

  it("reports stream existence and version", () => {
    const store = createStore();
    store.append("s", makeEvents(3));
    expect(store.streamExists("s")).toBe(true);
    expect(store.streamExists("t")).toBe(false);
    expect(store.streamVersion("s")).toBe(3);
    expect(store.streamVersion("t")).toBe(0);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers stream events in order", () => {
    const store = createStore();
    const handler = vi.fn();
    store.subscribe("s", handler);

    store.append("s", makeEvents(2));
    store.append("other", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls.map(([e]) => e.version)).toEqual([1, 2]);
  });

  it("delivers every stream to global subscribers", () => {
    const store = createStore();
    const handler = vi.fn();
    store.subscribeAll(handler);

    store.append("a", makeEvents(1));
    store.append("b", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("stops delivery after unsubscribe", () => {
    const store = createStore();
    const handler = vi.fn();
    const sub = store.subscribe("s", handler);
    const all = vi.fn();
    const allSub = store.subscribeAll(all);

    sub.unsubscribe();
    allSub.unsubscribe();
    store.append("s", makeEvents(1));

    expect(handler).not.toHaveBeenCalled();
    expect(all).not.toHaveBeenCalled();
  });

  it("sees the event already stored", () => {
    const store = createStore();
    let seen = 0;
    store.subscribe("s", () => {
      seen = store.streamVersion("s");
    });
    store.append("s", makeEvents(1));
    expect(seen).toBe(1);
  });
});
