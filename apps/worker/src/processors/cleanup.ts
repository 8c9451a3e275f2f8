import type { SweepResult } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import { archiveRevokedKeys, sweepSentEmails } from "@relaymail/core";
import type { ApiKeyStore, SentEmailStore } from "@relaymail/core";

export interface CleanupSentEmailsDeps {
  store: SentEmailStore;
  /** Null when sent-email retention is disabled. */
  retentionDays: number | null;
  logger: Logger;
  signal: AbortSignal;
}

export async function processCleanupSentEmails(deps: CleanupSentEmailsDeps): Promise<SweepResult | null> {
  if (deps.retentionDays === null) {
    deps.logger.debug("Sent-email retention disabled, skipping sweep");
    return null;
  }
  return sweepSentEmails({
    store: deps.store,
    retentionDays: deps.retentionDays,
    logger: deps.logger,
    signal: deps.signal,
  });
}

export interface CleanupRevokedKeysDeps {
  store: ApiKeyStore;
  retentionDays: number;
  logger: Logger;
  signal: AbortSignal;
}

export async function processCleanupRevokedKeys(deps: CleanupRevokedKeysDeps): Promise<SweepResult> {
  return archiveRevokedKeys({
    store: deps.store,
    retentionDays: deps.retentionDays,
    logger: deps.logger,
    signal: deps.signal,
  });
}
