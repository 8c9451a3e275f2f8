import { setTimeout as sleep } from "node:timers/promises";
import type { SweepResult } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import type { ApiKeyStore, SentEmailStore } from "./stores.interface.js";

const DAY_MS = 86_400_000;

export const SENT_EMAIL_SWEEP = {
  initialChunk: 1_000,
  minChunk: 1_000,
  maxChunk: 5_000,
  /** Chunks faster than this double the next chunk. */
  fastMs: 500,
  /** Chunks slower than this halve it. */
  slowMs: 2_000,
  maxChunksPerRun: 500,
  pauseMs: 100,
} as const;

export const KEY_ARCHIVE_SWEEP = {
  chunk: 100,
  maxChunksPerRun: 100,
} as const;

/**
 * Next chunk size from how long the last one took.
 */
export function nextChunkSize(current: number, elapsedMs: number): number {
  if (elapsedMs < SENT_EMAIL_SWEEP.fastMs) {
    return Math.min(current * 2, SENT_EMAIL_SWEEP.maxChunk);
  }
  if (elapsedMs > SENT_EMAIL_SWEEP.slowMs) {
    return Math.max(Math.floor(current / 2), SENT_EMAIL_SWEEP.minChunk);
  }
  return current;
}

export interface SentEmailSweepOptions {
  store: SentEmailStore;
  retentionDays: number;
  logger: Logger;
  signal?: AbortSignal;
  now?: () => Date;
  /** Monotonic milliseconds, for chunk timing. */
  clock?: () => number;
  pause?: (ms: number) => Promise<void>;
}

/**
 * Delete sent emails past retention in bounded chunks whose size follows
 * observed latency. A run stops at the chunk cap and resumes next time.
 */
export async function sweepSentEmails(options: SentEmailSweepOptions): Promise<SweepResult> {
  const { store, logger, signal } = options;
  const now = options.now ?? (() => new Date());
  const clock = options.clock ?? (() => performance.now());
  const pause = options.pause ?? ((ms: number) => sleep(ms));

  const cutoff = new Date(now().getTime() - options.retentionDays * DAY_MS);
  const startedAt = clock();
  let chunk: number = SENT_EMAIL_SWEEP.initialChunk;
  let processed = 0;
  let batches = 0;
  let incomplete = false;

  for (;;) {
    if (signal?.aborted) {
      incomplete = true;
      break;
    }
    if (batches >= SENT_EMAIL_SWEEP.maxChunksPerRun) {
      incomplete = true;
      logger.warn({ batches, processed }, "Sent-email sweep hit the chunk cap, resuming next run");
      break;
    }

    const chunkStart = clock();
    const deleted = await store.deleteSentBefore(cutoff, chunk);
    const elapsed = clock() - chunkStart;
    batches++;
    processed += deleted;

    if (deleted < chunk) break;

    const next = nextChunkSize(chunk, elapsed);
    if (next !== chunk) {
      logger.debug({ from: chunk, to: next, elapsedMs: Math.round(elapsed) }, "Adjusted sweep chunk size");
    }
    chunk = next;
    await pause(SENT_EMAIL_SWEEP.pauseMs);
  }

  const result: SweepResult = {
    processed,
    batches,
    durationMs: Math.round(clock() - startedAt),
    incomplete,
  };
  logger.info({ ...result, cutoff: cutoff.toISOString() }, "Sent-email sweep finished");
  return result;
}

export interface KeyArchiveSweepOptions {
  store: ApiKeyStore;
  retentionDays: number;
  logger: Logger;
  signal?: AbortSignal;
  now?: () => Date;
}

/**
 * Move keys revoked longer than the retention window into the archive,
 * one transaction per chunk.
 */
export async function archiveRevokedKeys(options: KeyArchiveSweepOptions): Promise<SweepResult> {
  const { store, logger, signal } = options;
  const now = (options.now ?? (() => new Date()))();
  const cutoff = new Date(now.getTime() - options.retentionDays * DAY_MS);
  const startedAt = Date.now();
  let processed = 0;
  let batches = 0;
  let incomplete = false;

  for (;;) {
    if (signal?.aborted || batches >= KEY_ARCHIVE_SWEEP.maxChunksPerRun) {
      incomplete = true;
      break;
    }

    const moved = await store.archiveRevokedBefore(cutoff, KEY_ARCHIVE_SWEEP.chunk, now);
    batches++;
    processed += moved;
    if (moved < KEY_ARCHIVE_SWEEP.chunk) break;
  }

  const result: SweepResult = { processed, batches, durationMs: Date.now() - startedAt, incomplete };
  logger.info({ ...result, cutoff: cutoff.toISOString() }, "Revoked-key archive sweep finished");
  return result;
}
