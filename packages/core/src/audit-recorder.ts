import type { AuditEntry } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import { errorMessage } from "@relaymail/errors";
import type { AuditRecord, AuditStore } from "./stores.interface.js";

/**
 * Where request handlers and jobs hand audit entries. Never blocks.
 */
export interface AuditSink {
  record(entry: AuditEntry): void;
}

export interface AuditRecorderOptions {
  /** Entries held in memory before new ones are dropped. Default: 10000 */
  capacity?: number;
  /** Entries per store write. Default: 50 */
  batchSize?: number;
  now?: () => Date;
}

/**
 * Bounded in-memory queue drained into the audit store in the background.
 * A full queue or a failed write loses entries; callers never see either.
 */
export class AuditRecorder implements AuditSink {
  private readonly queue: AuditRecord[] = [];
  private readonly capacity: number;
  private readonly batchSize: number;
  private readonly now: () => Date;
  private scheduled: NodeJS.Immediate | undefined;
  private draining: Promise<void> | null = null;
  private stopped = false;
  private droppedCount = 0;

  constructor(
    private readonly store: AuditStore,
    private readonly logger: Logger,
    options: AuditRecorderOptions = {},
  ) {
    this.capacity = options.capacity ?? 10_000;
    this.batchSize = options.batchSize ?? 50;
    this.now = options.now ?? (() => new Date());
  }

  get pending(): number {
    return this.queue.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  record(entry: AuditEntry): void {
    if (this.stopped) {
      this.drop(entry, "Audit recorder stopped, dropping entry");
      return;
    }
    if (this.queue.length >= this.capacity) {
      this.drop(entry, "Audit queue full, dropping entry");
      return;
    }

    this.queue.push({ ...entry, timestamp: this.now() });
    this.schedule();
  }

  /**
   * Resolves once everything queued so far has been written or dropped.
   */
  async flush(): Promise<void> {
    if (this.scheduled) {
      clearImmediate(this.scheduled);
      this.scheduled = undefined;
    }
    while (this.draining) {
      await this.draining;
    }
    if (this.queue.length > 0) {
      this.startDrain();
      await this.draining;
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;
    await this.flush();
    this.logger.info({ dropped: this.droppedCount }, "Audit recorder stopped");
  }

  private drop(entry: AuditEntry, message: string): void {
    this.droppedCount++;
    this.logger.warn({ action: entry.action, resourceId: entry.resourceId }, message);
  }

  private schedule(): void {
    if (this.scheduled || this.draining) return;
    this.scheduled = setImmediate(() => {
      this.scheduled = undefined;
      this.startDrain();
    });
  }

  private startDrain(): void {
    if (this.scheduled) {
      clearImmediate(this.scheduled);
      this.scheduled = undefined;
    }
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.queue.length > 0 && !this.stopped) this.schedule();
    });
  }

  private async drain(): Promise<void> {
    while (this.queue.length > 0) {
      const batch = this.queue.splice(0, this.batchSize);
      try {
        await this.store.insertMany(batch);
      } catch (err) {
        this.logger.error(
          { count: batch.length, error: errorMessage(err) },
          "Failed to write audit entries",
        );
      }
    }
  }
}
