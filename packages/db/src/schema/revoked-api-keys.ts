import { boolean, jsonb, pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const revokedApiKeys = pgTable("revoked_api_keys", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  keyPrefix: text("key_prefix").notNull(),
  isAdmin: boolean("is_admin").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  revokedAt: timestamp("revoked_at", { withTimezone: true }).notNull(),
  archivedAt: timestamp("archived_at", { withTimezone: true }).notNull().defaultNow(),
  lastUsedAt: timestamp("last_used_at", { withTimezone: true }),
  lastUsedIp: text("last_used_ip"),
  allowedDomainIds: jsonb("allowed_domain_ids").notNull().$type<string[]>().default([]),
});
