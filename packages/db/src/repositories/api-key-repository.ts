import { and, asc, count, desc, eq, inArray, isNull, lt } from "drizzle-orm";
import type { ApiKey, ArchivedApiKey, Paginated, PaginationParams } from "@relaymail/types";
import type { ApiKeyStore, NewApiKey } from "@relaymail/core";
import type { DbClient } from "../client.js";
import { apiKeyDomains, apiKeys, revokedApiKeys } from "../schema/index.js";
import type { ApiKeyRow } from "../mappers.js";
import { groupDomainIds, toApiKey, toArchivedApiKey } from "../mappers.js";

type Executor = Pick<DbClient, "select">;

export class ApiKeyRepository implements ApiKeyStore {
  constructor(private readonly db: DbClient) {}

  async findActiveByPrefix(prefix: string): Promise<ApiKey[]> {
    const rows = await this.db
      .select()
      .from(apiKeys)
      .where(and(eq(apiKeys.keyPrefix, prefix), isNull(apiKeys.revokedAt)));
    return this.withDomains(this.db, rows);
  }

  async recordUsage(id: string, usedAt: Date, ip: string | null): Promise<void> {
    await this.db.update(apiKeys).set({ lastUsedAt: usedAt, lastUsedIp: ip }).where(eq(apiKeys.id, id));
  }

  async insert(key: NewApiKey): Promise<ApiKey> {
    const { allowedDomainIds, ...columns } = key;
    return this.db.transaction(async (tx) => {
      const [row] = await tx.insert(apiKeys).values(columns).returning();
      if (!row) {
        throw new Error("API key insert returned no row");
      }
      if (allowedDomainIds.length > 0) {
        await tx
          .insert(apiKeyDomains)
          .values(allowedDomainIds.map((domainId) => ({ apiKeyId: row.id, domainId })));
      }
      return toApiKey(row, [...allowedDomainIds]);
    });
  }

  async findById(id: string): Promise<ApiKey | null> {
    const rows = await this.db.select().from(apiKeys).where(eq(apiKeys.id, id)).limit(1);
    const [key] = await this.withDomains(this.db, rows);
    return key ?? null;
  }

  async list(params: PaginationParams): Promise<Paginated<ApiKey>> {
    const [totals, rows] = await Promise.all([
      this.db.select({ total: count() }).from(apiKeys),
      this.db
        .select()
        .from(apiKeys)
        .orderBy(desc(apiKeys.createdAt), desc(apiKeys.id))
        .limit(params.limit)
        .offset((params.page - 1) * params.limit),
    ]);
    return { items: await this.withDomains(this.db, rows), total: totals[0]?.total ?? 0 };
  }

  async revoke(id: string, at: Date): Promise<ApiKey | null> {
    // First revocation wins; later calls leave revoked_at alone
    await this.db
      .update(apiKeys)
      .set({ revokedAt: at })
      .where(and(eq(apiKeys.id, id), isNull(apiKeys.revokedAt)));
    return this.findById(id);
  }

  async findArchived(id: string): Promise<ArchivedApiKey | null> {
    const [row] = await this.db.select().from(revokedApiKeys).where(eq(revokedApiKeys.id, id)).limit(1);
    return row ? toArchivedApiKey(row) : null;
  }

  async listArchived(params: PaginationParams): Promise<Paginated<ArchivedApiKey>> {
    const [totals, rows] = await Promise.all([
      this.db.select({ total: count() }).from(revokedApiKeys),
      this.db
        .select()
        .from(revokedApiKeys)
        .orderBy(desc(revokedApiKeys.revokedAt))
        .limit(params.limit)
        .offset((params.page - 1) * params.limit),
    ]);
    return { items: rows.map(toArchivedApiKey), total: totals[0]?.total ?? 0 };
  }

  async archiveRevokedBefore(cutoff: Date, limit: number, archivedAt: Date): Promise<number> {
    return this.db.transaction(async (tx) => {
      const due = await tx
        .select()
        .from(apiKeys)
        .where(lt(apiKeys.revokedAt, cutoff))
        .orderBy(asc(apiKeys.revokedAt))
        .limit(limit)
        .for("update", { skipLocked: true });
      if (due.length === 0) return 0;

      const keys = await this.withDomains(tx, due);
      await tx.insert(revokedApiKeys).values(
        keys.map((key) => ({
          id: key.id,
          name: key.name,
          keyPrefix: key.keyPrefix,
          isAdmin: key.isAdmin,
          createdAt: key.createdAt,
          revokedAt: key.revokedAt ?? cutoff,
          archivedAt,
          lastUsedAt: key.lastUsedAt,
          lastUsedIp: key.lastUsedIp,
          allowedDomainIds: key.allowedDomainIds,
        })),
      );
      // api_key_domains rows go with the key (ON DELETE CASCADE)
      await tx.delete(apiKeys).where(
        inArray(
          apiKeys.id,
          keys.map((key) => key.id),
        ),
      );
      return keys.length;
    });
  }

  private async withDomains(executor: Executor, rows: ApiKeyRow[]): Promise<ApiKey[]> {
    if (rows.length === 0) return [];
    const ids = rows.map((row) => row.id);
    const links = await executor
      .select({ apiKeyId: apiKeyDomains.apiKeyId, domainId: apiKeyDomains.domainId })
      .from(apiKeyDomains)
      .where(inArray(apiKeyDomains.apiKeyId, ids));
    const grouped = groupDomainIds(ids, links);
    return rows.map((row) => toApiKey(row, grouped.get(row.id) ?? []));
  }
}
