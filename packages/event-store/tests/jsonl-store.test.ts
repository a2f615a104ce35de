/**
 * Tests for JsonlEventStore.
 *
 * Verifies:
 * - Persistence: events and chain survive store recreation
 * - Crash safety: torn and malformed lines are skipped
 * - File creation: directory and file created on demand
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync, writeFileSync, rmSync, mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { DomainEvent } from "@allotment/types";
import { JsonlEventStore } from "../src/jsonl-store.js";
import { EventStoreError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

let testDir: string;
let testFile: string;

const clock = () => new Date("2025-03-01T08:00:00.000Z");

function makeEvent(n: number, causationId?: string): DomainEvent {
  return {
    type: "budget.spend.recorded",
    metadata: {
      eventId: `evt-${n}`,
      timestamp: "2025-03-01T08:00:00.000Z",
      actor: "alice",
      correlationId: `corr-${n}`,
      source: "ledger",
      ...(causationId !== undefined ? { causationId } : {}),
    },
    payload: { n },
  };
}

function createStore(filePath = testFile): JsonlEventStore {
  return new JsonlEventStore({ filePath, now: clock });
}

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), "allotment-jsonl-"));
  testFile = join(testDir, "events.jsonl");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// =============================================================================
// Persistence
// =============================================================================

describe("persistence", () => {
  it("creates the parent directory and the file on first append", () => {
    const nested = join(testDir, "a", "b", "events.jsonl");
    const store = createStore(nested);
    expect(existsSync(nested)).toBe(false);

    store.append("s", [makeEvent(1)]);
    expect(existsSync(nested)).toBe(true);
    expect(store.filePath).toBe(nested);
  });

  it("writes one line per event", () => {
    const store = createStore();
    store.append("s", [makeEvent(1), makeEvent(2)]);

    const lines = readFileSync(testFile, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1] ?? "")).toMatchObject({
      streamId: "s",
      version: 2,
      globalPosition: 2,
      event: { type: "budget.spend.recorded", payload: { n: 2 } },
    });
  });

  it("reloads events, positions and the chain", () => {
    const first = createStore();
    first.append("s", [makeEvent(1)]);
    first.append("t", [makeEvent(2, "evt-1")]);

    const reloaded = createStore();
    expect(reloaded.readAll()).toEqual(first.readAll());
    expect(reloaded.streamVersion("s")).toBe(1);
    expect(reloaded.globalPosition()).toBe(2);
    expect(reloaded.read("t")[0]?.event.metadata.causationId).toBe("evt-1");

    reloaded.append("s", [makeEvent(3)], { expectedVersion: 1 });
    expect(reloaded.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 3, errors: [] });
  });

  it("keeps concurrency checks after reload", () => {
    createStore().append("s", [makeEvent(1)]);
    expect(() =>
      createStore().append("s", [makeEvent(2)], { expectedVersion: "no_stream" }),
    ).toThrow(EventStoreError);
  });
});

// =============================================================================
// Crash safety
// =============================================================================

describe("corruption recovery", () => {
  it("skips a truncated last line", () => {
    createStore().append("s", [makeEvent(1), makeEvent(2)]);
    writeFileSync(testFile, '{"event":{"type":"budget.spend.recorded","metadata":{},', { flag: "a" });

    expect(createStore().readAll()).toHaveLength(2);
  });

  it("starts a fresh line when appending after a torn tail", () => {
    createStore().append("s", [makeEvent(1)]);
    writeFileSync(testFile, '{"event":', { flag: "a" });

    createStore().append("s", [makeEvent(2)]);

    const reloaded = createStore();
    expect(reloaded.read("s").map((e) => e.version)).toEqual([1, 2]);
    expect(reloaded.verifyIntegrity().valid).toBe(true);
  });

  it("skips lines that are valid JSON but not events", () => {
    createStore().append("s", [makeEvent(1)]);
    writeFileSync(testFile, '{"streamId":"s","version":2}\n', { flag: "a" });

    expect(createStore().readAll()).toHaveLength(1);
  });

  it("ignores blank lines", () => {
    createStore().append("s", [makeEvent(1)]);
    writeFileSync(testFile, "\n\n  \n", { flag: "a" });
    expect(createStore().readAll()).toHaveLength(1);
  });

  it("starts empty on a file of garbage and can append", () => {
    writeFileSync(testFile, "bad1\nbad2\n");
    const store = createStore();
    expect(store.globalPosition()).toBe(0);

    store.append("s", [makeEvent(1)]);
    expect(store.verifyIntegrity().valid).toBe(true);
  });

  it("reports a line edited on disk", () => {
    createStore().append("s", [makeEvent(1), makeEvent(2)]);
    const edited = readFileSync(testFile, "utf-8").replace('"n":1', '"n":9');
    writeFileSync(testFile, edited);

    const result = createStore().verifyIntegrity();
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toEqual([1]);
  });
});
