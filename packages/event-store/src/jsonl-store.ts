/**
 * File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append is written in one call and fsynced before it returns
 * - Partial or malformed lines (torn writes) are skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format, one line per event:
 * {"event":{...},"streamId":"...","version":1,"globalPosition":1,"appendedAt":"...","hash":"...","previousHash":"..."}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { EventStoreOptions, HashedStoredEvent } from "./types.js";
import { InMemoryEventStore } from "./in-memory-store.js";

export interface JsonlEventStoreOptions extends EventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

const MetadataSchema = z.object({
  eventId: z.string(),
  timestamp: z.string(),
  actor: z.string(),
  causationId: z.string().optional(),
  correlationId: z.string(),
  source: z.enum(["ledger", "api"]),
});

const RecordSchema = z.object({
  event: z.object({
    type: z.string(),
    metadata: MetadataSchema,
    payload: z.record(z.unknown()),
  }),
  streamId: z.string().min(1),
  version: z.number().int().positive(),
  globalPosition: z.number().int().positive(),
  appendedAt: z.string(),
  hash: z.string(),
  previousHash: z.string(),
});

/**
 * Durable event store. The in-memory index is rebuilt from the file
 * on construction; the parent directory is created if missing.
 */
export class JsonlEventStore extends InMemoryEventStore {
  private readonly _filePath: string;

  /** The file ends in a torn line; the next write starts a fresh one */
  private _tornTail = false;

  constructor(options: JsonlEventStoreOptions) {
    super(options);
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  protected override persist(events: readonly HashedStoredEvent[]): void {
    const lines = (this._tornTail ? "\n" : "")
      + events.map((event) => JSON.stringify(event) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, lines, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    this._tornTail = false;
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    this._tornTail = content.length > 0 && !content.endsWith("\n");

    const lines = content.split("\n");
    for (const line of lines) {
      const record = parseLine(line);
      if (record !== undefined) {
        this.restore(record);
      }
    }
  }
}

/**
 * A valid record, or undefined for a blank, torn or malformed line.
 */
function parseLine(line: string): HashedStoredEvent | undefined {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    return undefined;
  }

  const parsed = RecordSchema.safeParse(json);
  if (!parsed.success) {
    return undefined;
  }

  const { event, ...rest } = parsed.data;
  const { causationId, ...metadata } = event.metadata;
  return {
    ...rest,
    event: {
      type: event.type,
      metadata: causationId === undefined ? metadata : { ...metadata, causationId },
      payload: event.payload,
    },
  };
}
