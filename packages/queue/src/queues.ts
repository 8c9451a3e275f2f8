import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type {
  CleanupRevokedKeysJobData,
  CleanupSentEmailsJobData,
  DomainSetupJobData,
  DomainVerifyJobData,
} from "@relaymail/types";

export const QUEUE_NAMES = {
  DOMAIN_SETUP: "relaymail:domain-setup",
  DOMAIN_VERIFY: "relaymail:domain-verify",
  CLEANUP_SENT_EMAILS: "relaymail:cleanup-sent-emails",
  CLEANUP_REVOKED_KEYS: "relaymail:cleanup-revoked-keys",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    username: parsed.username || undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: parsed.pathname.length > 1 ? Number(parsed.pathname.slice(1)) : undefined,
    tls: parsed.protocol === "rediss:" ? {} : undefined,
  };
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  // Setup runs once per domain; a failure is recorded on the domain row
  const setupQueue = new Queue<DomainSetupJobData>(QUEUE_NAMES.DOMAIN_SETUP, defaultOpts);

  const verifyQueue = new Queue<DomainVerifyJobData>(QUEUE_NAMES.DOMAIN_VERIFY, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 500 },
    },
  });

  const cleanupSentEmailsQueue = new Queue<CleanupSentEmailsJobData>(
    QUEUE_NAMES.CLEANUP_SENT_EMAILS,
    defaultOpts,
  );

  const cleanupRevokedKeysQueue = new Queue<CleanupRevokedKeysJobData>(
    QUEUE_NAMES.CLEANUP_REVOKED_KEYS,
    defaultOpts,
  );

  return { setupQueue, verifyQueue, cleanupSentEmailsQueue, cleanupRevokedKeysQueue };
}

export type Queues = ReturnType<typeof createQueues>;

export async function closeQueues(queues: Queues): Promise<void> {
  await Promise.all(Object.values(queues).map((queue) => queue.close()));
}
