import { and, count, desc, eq, gte, lte, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { AuditLog, AuditQuery, Paginated } from "@relaymail/types";
import type { AuditRecord, AuditStore } from "@relaymail/core";
import type { DbClient } from "../client.js";
import { auditLogs } from "../schema/index.js";
import { toAuditLog } from "../mappers.js";

export class AuditRepository implements AuditStore {
  constructor(private readonly db: DbClient) {}

  async insertMany(entries: AuditRecord[]): Promise<void> {
    if (entries.length === 0) return;
    await this.db.insert(auditLogs).values(
      entries.map((entry) => ({
        timestamp: entry.timestamp,
        action: entry.action,
        actorType: entry.actorType,
        actorId: entry.actorId,
        resourceType: entry.resourceType,
        resourceId: entry.resourceId,
        statusCode: entry.statusCode,
        errorMessage: entry.errorMessage ?? null,
        details: entry.details ?? null,
        ipAddress: entry.ipAddress ?? null,
        userAgent: entry.userAgent ?? null,
      })),
    );
  }

  async list(query: AuditQuery): Promise<Paginated<AuditLog>> {
    const conditions: SQL[] = [];
    // Filter values are free text; the column is typed to known actions
    if (query.action) conditions.push(sql`${auditLogs.action} = ${query.action}`);
    if (query.actorId) conditions.push(eq(auditLogs.actorId, query.actorId));
    if (query.from) conditions.push(gte(auditLogs.timestamp, query.from));
    if (query.to) conditions.push(lte(auditLogs.timestamp, query.to));
    const where = and(...conditions);

    const [totals, rows] = await Promise.all([
      this.db.select({ total: count() }).from(auditLogs).where(where),
      this.db
        .select()
        .from(auditLogs)
        .where(where)
        .orderBy(desc(auditLogs.timestamp))
        .limit(query.limit)
        .offset((query.page - 1) * query.limit),
    ]);
    return { items: rows.map(toAuditLog), total: totals[0]?.total ?? 0 };
  }
}
