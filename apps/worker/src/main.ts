import { parseEnv } from "@relaymail/config";
import { createLogger } from "@relaymail/logger";
import { errorMessage } from "@relaymail/errors";
import { createRepositories, createWorkerDbClient } from "@relaymail/db";
import { createProviders } from "@relaymail/providers";
import { AuditRecorder, DomainVerificationService } from "@relaymail/core";
import {
  QUEUE_NAMES,
  closeQueues,
  createQueues,
  parseRedisConnection,
  scheduleRecurringJobs,
} from "@relaymail/queue";
import { createWorkers } from "./workers.js";
import { processDomainSetup } from "./processors/domain-setup.js";
import { processDomainVerify } from "./processors/domain-verify.js";
import { processCleanupRevokedKeys, processCleanupSentEmails } from "./processors/cleanup.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "relaymail-worker" });

  const database = createWorkerDbClient({ url: config.database.url });
  const stores = createRepositories(database);
  const providers = createProviders(config, logger);
  const audit = new AuditRecorder(stores.audit, logger.child({ component: "audit" }));
  const shutdownController = new AbortController();
  const signal = shutdownController.signal;

  const verification = new DomainVerificationService({
    domains: stores.domains,
    identity: providers.identity,
    publisher: providers.publisher,
    resolver: providers.resolver,
    audit,
    logger: logger.child({ component: "verification" }),
    timeoutHours: config.verification.timeoutHours,
    pollIntervalMinutes: config.verification.pollIntervalMinutes,
  });

  const connection = parseRedisConnection(config.redis.url);
  const queues = createQueues({ connection });
  await scheduleRecurringJobs(queues, {
    pollIntervalMinutes: config.verification.pollIntervalMinutes,
    sentEmailSweep: config.retention.sentEmailDays !== null,
  });

  const workers = createWorkers(
    connection,
    {
      domainSetup: (data) =>
        processDomainSetup(data, { verification, logger: logger.child({ job: "domain-setup" }) }),
      domainVerify: () =>
        processDomainVerify({ verification, logger: logger.child({ job: "domain-verify" }), signal }),
      cleanupSentEmails: () =>
        processCleanupSentEmails({
          store: stores.sentEmails,
          retentionDays: config.retention.sentEmailDays,
          logger: logger.child({ job: "cleanup-sent-emails" }),
          signal,
        }),
      cleanupRevokedKeys: () =>
        processCleanupRevokedKeys({
          store: stores.apiKeys,
          retentionDays: config.retention.apiKeyDays,
          logger: logger.child({ job: "cleanup-revoked-keys" }),
          signal,
        }),
    },
    logger,
  );

  logger.info(
    { workers: workers.length, queues: Object.values(QUEUE_NAMES) },
    "Worker started",
  );

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ reason }, "Shutting down");

    // Running sweeps and polls stop at their next chunk or domain
    shutdownController.abort();
    await Promise.all(workers.map((w) => w.close()));
    await closeQueues(queues);
    await audit.stop();
    await database.close();
    logger.info("Worker stopped");
  };

  const onSignal = (reason: string) => {
    shutdown(reason)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("[worker] Fatal error:", err);
  process.exit(1);
});
