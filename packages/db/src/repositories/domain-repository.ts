import { and, count, desc, eq, inArray, isNull } from "drizzle-orm";
import type { Domain, DomainPatch, DomainStatus, Paginated } from "@relaymail/types";
import { ConflictError, DomainExistsError } from "@relaymail/errors";
import { serializeDnsRecords } from "@relaymail/core";
import type { DomainListQuery, DomainStore, NewDomain } from "@relaymail/core";
import type { DbClient } from "../client.js";
import { apiKeyDomains, apiKeys, domains } from "../schema/index.js";
import { toDomain } from "../mappers.js";
import { PG_FOREIGN_KEY_VIOLATION, PG_UNIQUE_VIOLATION, pgErrorCode } from "../pg-errors.js";

function toColumns(patch: DomainPatch): Partial<typeof domains.$inferInsert> {
  const { dnsRecords, ...columns } = patch;
  const values: Partial<typeof domains.$inferInsert> = { ...columns };
  if (dnsRecords !== undefined) {
    values.dnsRecords = dnsRecords === null ? null : serializeDnsRecords(dnsRecords);
  }
  return values;
}

export class DomainRepository implements DomainStore {
  constructor(private readonly db: DbClient) {}

  async insert(domain: NewDomain, grantToApiKeyId?: string | null): Promise<Domain> {
    try {
      return await this.db.transaction(async (tx) => {
        const [row] = await tx
          .insert(domains)
          .values({ id: domain.id, name: domain.name, createdAt: domain.createdAt, status: "pending" })
          .returning();
        if (!row) {
          throw new Error("Domain insert returned no row");
        }
        if (grantToApiKeyId) {
          await tx.insert(apiKeyDomains).values({ apiKeyId: grantToApiKeyId, domainId: row.id });
        }
        return toDomain(row);
      });
    } catch (err) {
      // The unique index is the authority when two creates race
      if (pgErrorCode(err) === PG_UNIQUE_VIOLATION) {
        throw new DomainExistsError(domain.name);
      }
      throw err;
    }
  }

  async findById(id: string): Promise<Domain | null> {
    const [row] = await this.db.select().from(domains).where(eq(domains.id, id)).limit(1);
    return row ? toDomain(row) : null;
  }

  async findByName(name: string): Promise<Domain | null> {
    const [row] = await this.db.select().from(domains).where(eq(domains.name, name)).limit(1);
    return row ? toDomain(row) : null;
  }

  async list(query: DomainListQuery): Promise<Paginated<Domain>> {
    if (query.domainIds !== "all" && query.domainIds.length === 0) {
      return { items: [], total: 0 };
    }
    const where = query.domainIds === "all" ? undefined : inArray(domains.id, query.domainIds);

    const [totals, rows] = await Promise.all([
      this.db.select({ total: count() }).from(domains).where(where),
      this.db
        .select()
        .from(domains)
        .where(where)
        .orderBy(desc(domains.createdAt), desc(domains.id))
        .limit(query.limit)
        .offset((query.page - 1) * query.limit),
    ]);

    return { items: rows.map(toDomain), total: totals[0]?.total ?? 0 };
  }

  async listByStatus(status: DomainStatus): Promise<Domain[]> {
    const rows = await this.db
      .select()
      .from(domains)
      .where(eq(domains.status, status))
      .orderBy(domains.createdAt);
    return rows.map(toDomain);
  }

  async update(id: string, patch: DomainPatch): Promise<Domain | null> {
    const values = toColumns(patch);
    if (Object.keys(values).length === 0) {
      return this.findById(id);
    }

    const [row] = await this.db.update(domains).set(values).where(eq(domains.id, id)).returning();
    return row ? toDomain(row) : null;
  }

  async transition(id: string, from: DomainStatus, patch: DomainPatch): Promise<Domain | null> {
    const values = toColumns(patch);
    if (Object.keys(values).length === 0) {
      const current = await this.findById(id);
      return current?.status === from ? current : null;
    }

    const [row] = await this.db
      .update(domains)
      .set(values)
      .where(and(eq(domains.id, id), eq(domains.status, from)))
      .returning();
    return row ? toDomain(row) : null;
  }

  async countActiveKeyReferences(id: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(apiKeyDomains)
      .innerJoin(apiKeys, eq(apiKeyDomains.apiKeyId, apiKeys.id))
      .where(and(eq(apiKeyDomains.domainId, id), isNull(apiKeys.revokedAt)));
    return row?.total ?? 0;
  }

  async delete(id: string): Promise<boolean> {
    try {
      return await this.db.transaction(async (tx) => {
        const [active] = await tx
          .select({ total: count() })
          .from(apiKeyDomains)
          .innerJoin(apiKeys, eq(apiKeyDomains.apiKeyId, apiKeys.id))
          .where(and(eq(apiKeyDomains.domainId, id), isNull(apiKeys.revokedAt)));
        if ((active?.total ?? 0) > 0) {
          throw new ConflictError("Domain is assigned to active API keys", "domain_in_use");
        }

        // Only revoked keys' rows remain at this point
        await tx.delete(apiKeyDomains).where(eq(apiKeyDomains.domainId, id));
        const deleted = await tx.delete(domains).where(eq(domains.id, id)).returning({ id: domains.id });
        return deleted.length > 0;
      });
    } catch (err) {
      if (pgErrorCode(err) === PG_FOREIGN_KEY_VIOLATION) {
        throw new ConflictError("Domain is assigned to active API keys", "domain_in_use");
      }
      throw err;
    }
  }
}
