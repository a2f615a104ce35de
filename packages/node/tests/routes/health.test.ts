/**
 * Tests for health routes.
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonlEventStore } from "@allotment/event-store";
import { asIdentity, createTestApp, jsonRequest } from "../setup.js";

let testDir: string | undefined;

afterEach(() => {
  if (testDir !== undefined) {
    rmSync(testDir, { recursive: true, force: true });
    testDir = undefined;
  }
});

describe("GET /health", () => {
  it("returns ok without an identity", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/health"));
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok" });
  });
});

describe("GET /ready", () => {
  it("reports the number of budgets and a valid event log", async () => {
    const { app } = createTestApp();
    await app.request(asIdentity("alice", "/api/v1/budget", "POST", { income: "30000" }));
    await app.request(asIdentity("alice", "/api/v1/budget/spend", "POST", { amount: "10" }));

    const res = await app.request(jsonRequest("/ready"));
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ready",
      identities: 1,
      eventLog: { valid: true, lastVerifiedPosition: 1, errors: 0 },
    });
  });

  it("returns 503 when the event log fails verification", async () => {
    testDir = mkdtempSync(join(tmpdir(), "allotment-ready-"));
    const filePath = join(testDir, "events.jsonl");

    const writer = createTestApp({ eventStore: new JsonlEventStore({ filePath }) });
    await writer.app.request(asIdentity("alice", "/api/v1/budget", "POST", { income: "30000" }));
    await writer.app.request(asIdentity("alice", "/api/v1/budget/spend", "POST", { amount: "10" }));
    await writer.app.request(asIdentity("alice", "/api/v1/budget/spend", "POST", { amount: "20" }));

    writeFileSync(filePath, readFileSync(filePath, "utf-8").replace('"amount":"10"', '"amount":"99"'));

    const { app } = createTestApp({ eventStore: new JsonlEventStore({ filePath }) });
    const res = await app.request(jsonRequest("/ready"));
    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      status: "not_ready",
      identities: 0,
      eventLog: { valid: false, errors: 1 },
    });
  });
});
