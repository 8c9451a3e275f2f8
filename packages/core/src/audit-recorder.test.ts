import { describe, it, expect, vi } from "vitest";
import type { AuditEntry } from "@relaymail/types";
import { createLogger } from "@relaymail/logger";
import { AuditRecorder } from "./audit-recorder.js";
import type { AuditRecord } from "./stores.interface.js";
import { InMemoryAuditStore, InMemoryDatabase } from "./testing/index.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");
const logger = createLogger({ level: "silent" });

function entry(resourceId: string): AuditEntry {
  return {
    action: "domain.create",
    actorType: "admin",
    actorId: null,
    resourceType: "domain",
    resourceId,
    statusCode: 201,
  };
}

class CountingAuditStore extends InMemoryAuditStore {
  readonly batches: number[] = [];
  failNext = 0;

  override async insertMany(entries: AuditRecord[]): Promise<void> {
    this.batches.push(entries.length);
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error("connection reset");
    }
    await super.insertMany(entries);
  }
}

function setup(options: { capacity?: number; batchSize?: number } = {}) {
  const db = new InMemoryDatabase();
  const store = new CountingAuditStore(db);
  const recorder = new AuditRecorder(store, logger, { ...options, now: () => NOW });
  return { db, store, recorder };
}

describe("AuditRecorder", () => {
  it("returns before the entry is written and writes it in the background", async () => {
    const { db, recorder } = setup();

    recorder.record(entry("d1"));

    expect(db.auditLogs).toHaveLength(0);
    expect(recorder.pending).toBe(1);
    await vi.waitFor(() => {
      expect(db.auditLogs).toHaveLength(1);
    });
    expect(db.auditLogs[0]).toMatchObject({
      id: "1",
      timestamp: NOW,
      action: "domain.create",
      resourceId: "d1",
      errorMessage: null,
      details: null,
    });
  });

  it("writes in batches", async () => {
    const { db, store, recorder } = setup();

    for (let i = 0; i < 120; i++) recorder.record(entry(`d${String(i)}`));
    await recorder.flush();

    expect(store.batches).toEqual([50, 50, 20]);
    expect(db.auditLogs).toHaveLength(120);
  });

  it("drops entries past capacity", async () => {
    const { db, recorder } = setup({ capacity: 2 });

    recorder.record(entry("a"));
    recorder.record(entry("b"));
    recorder.record(entry("c"));

    expect(recorder.dropped).toBe(1);
    await recorder.flush();
    expect(db.auditLogs.map((log) => log.resourceId)).toEqual(["a", "b"]);
  });

  it("drops a batch whose write fails and keeps going", async () => {
    const { db, store, recorder } = setup({ batchSize: 2 });
    store.failNext = 1;

    recorder.record(entry("a"));
    recorder.record(entry("b"));
    recorder.record(entry("c"));
    await recorder.flush();

    expect(store.batches).toEqual([2, 1]);
    expect(db.auditLogs.map((log) => log.resourceId)).toEqual(["c"]);
    expect(recorder.pending).toBe(0);
  });

  it("writes what is queued on stop and refuses entries afterwards", async () => {
    const { db, recorder } = setup();
    recorder.record(entry("a"));

    await recorder.stop();
    recorder.record(entry("b"));

    expect(db.auditLogs.map((log) => log.resourceId)).toEqual(["a"]);
    expect(recorder.dropped).toBe(1);
    expect(recorder.pending).toBe(0);
  });
});
