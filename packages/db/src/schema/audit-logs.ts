import { randomUUID } from "node:crypto";
import { index, integer, jsonb, pgTable, text, timestamp } from "drizzle-orm/pg-core";
import type { ActorType, AuditAction, AuditEntry } from "@relaymail/types";

export const auditLogs = pgTable(
  "audit_logs",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => randomUUID()),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull().defaultNow(),
    action: text("action").notNull().$type<AuditAction>(), // e.g. "domain.create", "api_key.revoke"
    actorType: text("actor_type").notNull().$type<ActorType>(),
    actorId: text("actor_id"), // key prefix for API keys
    resourceType: text("resource_type").notNull().$type<AuditEntry["resourceType"]>(),
    resourceId: text("resource_id"),
    statusCode: integer("status_code").notNull(),
    errorMessage: text("error_message"),
    details: jsonb("details").$type<Record<string, unknown>>(),
    ipAddress: text("ip_address"),
    userAgent: text("user_agent"),
  },
  (t) => [
    index("audit_logs_timestamp_idx").on(t.timestamp),
    index("audit_logs_action_idx").on(t.action),
    index("audit_logs_actor_id_idx").on(t.actorId),
  ],
);
