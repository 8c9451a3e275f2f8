import { boolean, index, pgTable, primaryKey, text, timestamp } from "drizzle-orm/pg-core";
import { domains } from "./domains.js";

export const apiKeys = pgTable(
  "api_keys",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    keyHash: text("key_hash").notNull(),
    keySalt: text("key_salt").notNull(),
    keyPrefix: text("key_prefix").notNull(),
    isAdmin: boolean("is_admin").notNull().default(false),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    revokedAt: timestamp("revoked_at", { withTimezone: true }),
    lastUsedAt: timestamp("last_used_at", { withTimezone: true }),
    lastUsedIp: text("last_used_ip"),
  },
  (t) => [
    index("api_keys_key_prefix_idx").on(t.keyPrefix),
    index("api_keys_revoked_at_idx").on(t.revokedAt),
  ],
);

/** Allow-list of a non-admin key. A domain cannot be deleted while listed. */
export const apiKeyDomains = pgTable(
  "api_key_domains",
  {
    apiKeyId: text("api_key_id")
      .notNull()
      .references(() => apiKeys.id, { onDelete: "cascade" }),
    domainId: text("domain_id")
      .notNull()
      .references(() => domains.id, { onDelete: "restrict" }),
  },
  (t) => [
    primaryKey({ columns: [t.apiKeyId, t.domainId] }),
    index("api_key_domains_domain_id_idx").on(t.domainId),
  ],
);
