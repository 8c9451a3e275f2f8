import type { ApiKey, ArchivedApiKey, AuditLog, DnsRecord, Domain, SentEmail } from "@relaymail/types";
import { getApiKeyState } from "@relaymail/core";

export interface DomainResponse {
  id: string;
  name: string;
  status: Domain["status"];
  createdAt: string;
  verificationStartedAt: string | null;
  verifiedAt: string | null;
  lastCheckedAt: string | null;
  failureReason: string | null;
  dnsRecords: DnsRecord[] | null;
  nextCheckAt?: string | null;
}

const iso = (date: Date | null): string | null => (date ? date.toISOString() : null);

export function toDomainResponse(domain: Domain, nextCheckAt?: Date | null): DomainResponse {
  return {
    id: domain.id,
    name: domain.name,
    status: domain.status,
    createdAt: domain.createdAt.toISOString(),
    verificationStartedAt: iso(domain.verificationStartedAt),
    verifiedAt: iso(domain.verifiedAt),
    lastCheckedAt: iso(domain.lastCheckedAt),
    failureReason: domain.failureReason,
    dnsRecords: domain.dnsRecords,
    ...(nextCheckAt === undefined ? {} : { nextCheckAt: iso(nextCheckAt) }),
  };
}

export function toApiKeyResponse(key: ApiKey) {
  return {
    id: key.id,
    name: key.name,
    keyPrefix: key.keyPrefix,
    isAdmin: key.isAdmin,
    state: getApiKeyState(key),
    createdAt: key.createdAt.toISOString(),
    revokedAt: iso(key.revokedAt),
    lastUsedAt: iso(key.lastUsedAt),
    lastUsedIp: key.lastUsedIp,
    domainIds: key.allowedDomainIds,
  };
}

export function toArchivedApiKeyResponse(key: ArchivedApiKey) {
  return {
    id: key.id,
    name: key.name,
    keyPrefix: key.keyPrefix,
    isAdmin: key.isAdmin,
    state: getApiKeyState(key),
    createdAt: key.createdAt.toISOString(),
    revokedAt: key.revokedAt.toISOString(),
    archivedAt: key.archivedAt.toISOString(),
    lastUsedAt: iso(key.lastUsedAt),
    lastUsedIp: key.lastUsedIp,
    domainIds: key.allowedDomainIds,
  };
}

/**
 * Resend's retrieve shape. Bcc recipients are never returned.
 */
export function toSentEmailResponse(email: SentEmail) {
  return {
    object: "email" as const,
    id: email.id,
    message_id: email.messageId,
    from: email.fromAddress,
    to: email.toAddresses,
    cc: email.ccAddresses,
    reply_to: email.replyTo,
    subject: email.subject,
    html: email.htmlBody,
    text: email.textBody,
    created_at: email.sentAt.toISOString(),
    last_event: "sent" as const,
    domain_id: email.domainId,
    api_key_id: email.apiKeyId,
  };
}

export function toAuditLogResponse(log: AuditLog) {
  return { ...log, timestamp: log.timestamp.toISOString() };
}
