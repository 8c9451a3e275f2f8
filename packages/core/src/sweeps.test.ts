import { describe, it, expect } from "vitest";
import type { SentEmail } from "@relaymail/types";
import { createLogger } from "@relaymail/logger";
import { SENT_EMAIL_SWEEP, archiveRevokedKeys, nextChunkSize, sweepSentEmails } from "./sweeps.js";
import { InMemoryApiKeyStore, InMemoryDatabase, InMemorySentEmailStore } from "./testing/index.js";

const DAY = 86_400_000;
const NOW = new Date("2026-06-01T00:00:00.000Z");
const logger = createLogger({ level: "silent" });

interface ScriptedChunk {
  deleted: number;
  elapsedMs: number;
}

/** Answers each chunk from a script and advances a fake clock by its latency. */
class ScriptedSentEmails extends InMemorySentEmailStore {
  readonly requested: number[] = [];
  readonly cutoffs: Date[] = [];
  time = 0;

  constructor(private readonly script: (index: number, limit: number) => ScriptedChunk) {
    super(new InMemoryDatabase());
  }

  override async deleteSentBefore(cutoff: Date, limit: number): Promise<number> {
    const step = this.script(this.requested.length, limit);
    this.requested.push(limit);
    this.cutoffs.push(cutoff);
    this.time += step.elapsedMs;
    return step.deleted;
  }
}

describe("nextChunkSize", () => {
  it("doubles after a fast chunk up to the ceiling", () => {
    expect(nextChunkSize(1_000, 499)).toBe(2_000);
    expect(nextChunkSize(4_000, 10)).toBe(5_000);
    expect(nextChunkSize(5_000, 10)).toBe(5_000);
  });

  it("halves after a slow chunk down to the floor", () => {
    expect(nextChunkSize(5_000, 2_001)).toBe(2_500);
    expect(nextChunkSize(1_500, 3_000)).toBe(1_000);
    expect(nextChunkSize(1_000, 3_000)).toBe(1_000);
  });

  it("keeps the size in between", () => {
    expect(nextChunkSize(2_000, 500)).toBe(2_000);
    expect(nextChunkSize(2_000, 2_000)).toBe(2_000);
  });
});

describe("sweepSentEmails", () => {
  it("adapts the chunk size to latency and stops on a short chunk", async () => {
    const script: ScriptedChunk[] = [
      { deleted: 1_000, elapsedMs: 100 },
      { deleted: 2_000, elapsedMs: 100 },
      { deleted: 4_000, elapsedMs: 100 },
      { deleted: 5_000, elapsedMs: 3_000 },
      { deleted: 10, elapsedMs: 50 },
    ];
    const store = new ScriptedSentEmails((i) => script[i] ?? { deleted: 0, elapsedMs: 0 });
    const pauses: number[] = [];

    const result = await sweepSentEmails({
      store,
      retentionDays: 30,
      logger,
      now: () => NOW,
      clock: () => store.time,
      pause: async (ms) => {
        pauses.push(ms);
      },
    });

    expect(store.requested).toEqual([1_000, 2_000, 4_000, 5_000, 2_500]);
    expect(store.cutoffs[0]).toEqual(new Date(NOW.getTime() - 30 * DAY));
    expect(pauses).toEqual([100, 100, 100, 100]);
    expect(result).toEqual({ processed: 12_010, batches: 5, durationMs: 3_350, incomplete: false });
  });

  it("stops at the chunk cap and reports the run incomplete", async () => {
    const store = new ScriptedSentEmails((_i, limit) => ({ deleted: limit, elapsedMs: 1_000 }));

    const result = await sweepSentEmails({
      store,
      retentionDays: 30,
      logger,
      clock: () => store.time,
      pause: async () => {},
    });

    expect(result.batches).toBe(SENT_EMAIL_SWEEP.maxChunksPerRun);
    expect(result.processed).toBe(500 * 1_000);
    expect(result.incomplete).toBe(true);
  });

  it("stops between chunks once aborted", async () => {
    const store = new ScriptedSentEmails((_i, limit) => ({ deleted: limit, elapsedMs: 1_000 }));
    const controller = new AbortController();

    const result = await sweepSentEmails({
      store,
      retentionDays: 30,
      logger,
      signal: controller.signal,
      clock: () => store.time,
      pause: async () => {
        controller.abort();
      },
    });

    expect(result).toMatchObject({ processed: 1_000, batches: 1, incomplete: true });
  });

  it("deletes only emails older than the retention window", async () => {
    const db = new InMemoryDatabase();
    const store = new InMemorySentEmailStore(db);
    const email = (id: string, sentAt: Date): SentEmail => ({
      id,
      messageId: `m-${id}`,
      sentAt,
      fromAddress: "a@example.com",
      toAddresses: ["b@example.org"],
      ccAddresses: null,
      bccAddresses: null,
      replyTo: null,
      subject: "s",
      htmlBody: null,
      textBody: "t",
      domainId: "dom-1",
      apiKeyId: null,
    });
    await store.insert(email("old-1", new Date(NOW.getTime() - 31 * DAY)));
    await store.insert(email("old-2", new Date(NOW.getTime() - 40 * DAY)));
    await store.insert(email("recent", new Date(NOW.getTime() - 29 * DAY)));

    const result = await sweepSentEmails({ store, retentionDays: 30, logger, now: () => NOW });

    expect(result).toMatchObject({ processed: 2, batches: 1, incomplete: false });
    expect([...db.sentEmails.keys()]).toEqual(["recent"]);
  });
});

describe("archiveRevokedKeys", () => {
  class ScriptedKeys extends InMemoryApiKeyStore {
    readonly calls: { cutoff: Date; limit: number; archivedAt: Date }[] = [];

    constructor(private readonly moved: number[]) {
      super(new InMemoryDatabase());
    }

    override async archiveRevokedBefore(cutoff: Date, limit: number, archivedAt: Date): Promise<number> {
      const moved = this.moved[this.calls.length] ?? 0;
      this.calls.push({ cutoff, limit, archivedAt });
      return moved;
    }
  }

  it("archives in chunks of 100 until a short chunk", async () => {
    const store = new ScriptedKeys([100, 100, 37]);

    const result = await archiveRevokedKeys({ store, retentionDays: 90, logger, now: () => NOW });

    expect(result).toMatchObject({ processed: 237, batches: 3, incomplete: false });
    expect(store.calls[0]).toEqual({
      cutoff: new Date(NOW.getTime() - 90 * DAY),
      limit: 100,
      archivedAt: NOW,
    });
  });

  it("does nothing once aborted", async () => {
    const store = new ScriptedKeys([100]);
    const controller = new AbortController();
    controller.abort();

    const result = await archiveRevokedKeys({
      store,
      retentionDays: 90,
      logger,
      signal: controller.signal,
    });

    expect(result).toMatchObject({ processed: 0, batches: 0, incomplete: true });
    expect(store.calls).toHaveLength(0);
  });
});
