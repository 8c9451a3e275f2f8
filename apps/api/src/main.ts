import { readFileSync } from "node:fs";
import { parseEnv } from "@relaymail/config";
import { LogBuffer, createLogger } from "@relaymail/logger";
import { errorMessage } from "@relaymail/errors";
import { ApiKeyValidator } from "@relaymail/auth";
import { createDbClient, createRepositories, pingDatabase, runMigrations } from "@relaymail/db";
import { createProviders } from "@relaymail/providers";
import {
  ApiKeyService,
  AuditRecorder,
  DomainService,
  DomainVerificationService,
  EmailService,
} from "@relaymail/core";
import {
  BullMqSetupDispatcher,
  closeQueues,
  createQueues,
  parseRedisConnection,
} from "@relaymail/queue";
import { createApp } from "./app.js";

function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  const version = typeof raw === "object" && raw !== null ? Reflect.get(raw, "version") : undefined;
  return typeof version === "string" ? version : "0.0.0";
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logs = new LogBuffer();
  const logger = createLogger({ level: config.logLevel, service: "relaymail-api", buffer: logs });

  const database = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });
  await runMigrations(database.db, logger.child({ component: "migrations" }));

  const stores = createRepositories(database);
  const providers = createProviders(config, logger);
  const audit = new AuditRecorder(stores.audit, logger.child({ component: "audit" }));
  const queues = createQueues({ connection: parseRedisConnection(config.redis.url) });

  const app = createApp({
    config,
    version: packageVersion(),
    logger,
    logs,
    validator: new ApiKeyValidator(stores.apiKeys, logger.child({ component: "auth" })),
    domains: new DomainService({
      domains: stores.domains,
      identity: providers.identity,
      publisher: providers.publisher,
      dispatcher: new BullMqSetupDispatcher(queues.setupQueue),
      logger: logger.child({ component: "domains" }),
    }),
    verification: new DomainVerificationService({
      domains: stores.domains,
      identity: providers.identity,
      publisher: providers.publisher,
      resolver: providers.resolver,
      audit,
      logger: logger.child({ component: "verification" }),
      timeoutHours: config.verification.timeoutHours,
      pollIntervalMinutes: config.verification.pollIntervalMinutes,
    }),
    emails: new EmailService({
      domains: stores.domains,
      sentEmails: stores.sentEmails,
      sender: providers.sender,
      logger: logger.child({ component: "emails" }),
    }),
    apiKeys: new ApiKeyService({
      keys: stores.apiKeys,
      domains: stores.domains,
      logger: logger.child({ component: "api-keys" }),
    }),
    auditLog: stores.audit,
    audit,
    sender: providers.sender,
    pingDatabase: () => pingDatabase(database.db),
  });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: config.nodeEnv }, "API listening");
  });

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ reason }, "Shutting down");

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await closeQueues(queues);
    await audit.stop();
    await database.close();
    logger.info("API stopped");
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
  console.error("[api] Fatal error:", err);
  process.exit(1);
});
