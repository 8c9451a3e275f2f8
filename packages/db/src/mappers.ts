import type { ApiKey, ArchivedApiKey, AuditLog, Domain, SentEmail } from "@relaymail/types";
import { parseDnsRecords } from "@relaymail/core";
import type { apiKeys, auditLogs, domains, revokedApiKeys, sentEmails } from "./schema/index.js";

export type DomainRow = typeof domains.$inferSelect;
export type ApiKeyRow = typeof apiKeys.$inferSelect;
export type RevokedApiKeyRow = typeof revokedApiKeys.$inferSelect;
export type AuditLogRow = typeof auditLogs.$inferSelect;
export type SentEmailRow = typeof sentEmails.$inferSelect;

export function toDomain(row: DomainRow): Domain {
  return {
    id: row.id,
    name: row.name,
    status: row.status,
    createdAt: row.createdAt,
    verificationStartedAt: row.verificationStartedAt,
    verifiedAt: row.verifiedAt,
    lastCheckedAt: row.lastCheckedAt,
    failureReason: row.failureReason,
    providerIdentityRef: row.providerIdentityRef,
    dnsRecords: parseDnsRecords(row.dnsRecords),
  };
}

export function toApiKey(row: ApiKeyRow, allowedDomainIds: string[]): ApiKey {
  return { ...row, allowedDomainIds };
}

export function toArchivedApiKey(row: RevokedApiKeyRow): ArchivedApiKey {
  return { ...row, allowedDomainIds: [...row.allowedDomainIds] };
}

export function toAuditLog(row: AuditLogRow): AuditLog {
  return { ...row };
}

export function toSentEmail(row: SentEmailRow): SentEmail {
  return { ...row };
}

/**
 * Group join rows by key, keeping an entry (possibly empty) for every key.
 */
export function groupDomainIds(
  keyIds: readonly string[],
  rows: readonly { apiKeyId: string; domainId: string }[],
): Map<string, string[]> {
  const grouped = new Map<string, string[]>(keyIds.map((id) => [id, []]));
  for (const row of rows) {
    grouped.get(row.apiKeyId)?.push(row.domainId);
  }
  return grouped;
}
