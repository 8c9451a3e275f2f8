import { Worker } from "bullmq";
import type { ConnectionOptions, Job } from "bullmq";
import type {
  CleanupRevokedKeysJobData,
  CleanupSentEmailsJobData,
  DomainSetupJobData,
  DomainVerifyJobData,
} from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import { errorMessage } from "@relaymail/errors";
import { QUEUE_NAMES } from "@relaymail/queue";

export interface JobHandlers {
  domainSetup(data: DomainSetupJobData): Promise<unknown>;
  domainVerify(data: DomainVerifyJobData): Promise<unknown>;
  cleanupSentEmails(data: CleanupSentEmailsJobData): Promise<unknown>;
  cleanupRevokedKeys(data: CleanupRevokedKeysJobData): Promise<unknown>;
}

function logFailures(worker: Worker, logger: Logger): Worker {
  worker.on("failed", (job: Job | undefined, err: Error) => {
    logger.error(
      { queue: worker.name, jobId: job?.id, attempts: job?.attemptsMade, error: errorMessage(err) },
      "Job failed",
    );
  });
  worker.on("error", (err: Error) => {
    logger.error({ queue: worker.name, error: errorMessage(err) }, "Worker error");
  });
  return worker;
}

/**
 * One worker per queue. Polls and sweeps run one at a time so a slow run
 * never overlaps the next tick.
 */
export function createWorkers(connection: ConnectionOptions, handlers: JobHandlers, logger: Logger): Worker[] {
  const setupWorker = new Worker<DomainSetupJobData>(
    QUEUE_NAMES.DOMAIN_SETUP,
    async (job) => handlers.domainSetup(job.data),
    { connection, concurrency: 5 },
  );

  const verifyWorker = new Worker<DomainVerifyJobData>(
    QUEUE_NAMES.DOMAIN_VERIFY,
    async (job) => handlers.domainVerify(job.data),
    { connection, concurrency: 1 },
  );

  const sentEmailsWorker = new Worker<CleanupSentEmailsJobData>(
    QUEUE_NAMES.CLEANUP_SENT_EMAILS,
    async (job) => handlers.cleanupSentEmails(job.data),
    { connection, concurrency: 1 },
  );

  const revokedKeysWorker = new Worker<CleanupRevokedKeysJobData>(
    QUEUE_NAMES.CLEANUP_REVOKED_KEYS,
    async (job) => handlers.cleanupRevokedKeys(job.data),
    { connection, concurrency: 1 },
  );

  return [setupWorker, verifyWorker, sentEmailsWorker, revokedKeysWorker].map((worker) =>
    logFailures(worker, logger),
  );
}
