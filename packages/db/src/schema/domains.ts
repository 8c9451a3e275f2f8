import { index, pgEnum, pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const domainStatusEnum = pgEnum("domain_status", [
  "pending",
  "verifying",
  "verified",
  "failed",
]);

export const domains = pgTable(
  "domains",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull().unique(),
    status: domainStatusEnum("status").notNull().default("pending"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    verificationStartedAt: timestamp("verification_started_at", { withTimezone: true }),
    verifiedAt: timestamp("verified_at", { withTimezone: true }),
    lastCheckedAt: timestamp("last_checked_at", { withTimezone: true }),
    failureReason: text("failure_reason"),
    providerIdentityRef: text("provider_identity_ref"),
    // Serialized DnsRecord[]; see serializeDnsRecords
    dnsRecords: text("dns_records"),
  },
  (t) => [index("domains_status_idx").on(t.status)],
);
