import type { Queues } from "./queues.js";

export const SCHEDULER_IDS = {
  DOMAIN_VERIFY: "domain-verify-poll",
  CLEANUP_SENT_EMAILS: "cleanup-sent-emails-daily",
  CLEANUP_REVOKED_KEYS: "cleanup-revoked-keys-daily",
} as const;

/** Daily at 03:00 UTC. */
export const SENT_EMAIL_SWEEP_CRON = "0 3 * * *";
/** Daily at 04:00 UTC. */
export const REVOKED_KEY_SWEEP_CRON = "0 4 * * *";

export interface ScheduleOptions {
  pollIntervalMinutes: number;
  /** False when sent-email retention is disabled. */
  sentEmailSweep: boolean;
}

/**
 * Register the recurring jobs. Upserting is idempotent, so every worker
 * start may call this.
 */
export async function scheduleRecurringJobs(
  queues: Pick<Queues, "verifyQueue" | "cleanupSentEmailsQueue" | "cleanupRevokedKeysQueue">,
  options: ScheduleOptions,
): Promise<void> {
  await queues.verifyQueue.upsertJobScheduler(
    SCHEDULER_IDS.DOMAIN_VERIFY,
    { every: options.pollIntervalMinutes * 60_000 },
    { name: "domain-verify", data: { type: "domain-verify" } },
  );

  if (options.sentEmailSweep) {
    await queues.cleanupSentEmailsQueue.upsertJobScheduler(
      SCHEDULER_IDS.CLEANUP_SENT_EMAILS,
      { pattern: SENT_EMAIL_SWEEP_CRON, tz: "UTC" },
      { name: "cleanup-sent-emails", data: { type: "cleanup-sent-emails" } },
    );
  } else {
    await queues.cleanupSentEmailsQueue.removeJobScheduler(SCHEDULER_IDS.CLEANUP_SENT_EMAILS);
  }

  await queues.cleanupRevokedKeysQueue.upsertJobScheduler(
    SCHEDULER_IDS.CLEANUP_REVOKED_KEYS,
    { pattern: REVOKED_KEY_SWEEP_CRON, tz: "UTC" },
    { name: "cleanup-revoked-keys", data: { type: "cleanup-revoked-keys" } },
  );
}
