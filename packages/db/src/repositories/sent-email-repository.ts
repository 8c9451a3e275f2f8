import { and, desc, eq, gte, inArray, lt, lte, or } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { SentEmail, SentEmailQuery, SentEmailSummary } from "@relaymail/types";
import type { SentEmailStore } from "@relaymail/core";
import type { DbClient } from "../client.js";
import { sentEmails } from "../schema/index.js";
import { toSentEmail } from "../mappers.js";

export class SentEmailRepository implements SentEmailStore {
  constructor(private readonly db: DbClient) {}

  async insert(email: SentEmail): Promise<void> {
    await this.db.insert(sentEmails).values(email);
  }

  async findById(id: string): Promise<SentEmail | null> {
    const [row] = await this.db.select().from(sentEmails).where(eq(sentEmails.id, id)).limit(1);
    return row ? toSentEmail(row) : null;
  }

  async list(query: SentEmailQuery): Promise<SentEmailSummary[]> {
    if (query.domainIds !== "all" && query.domainIds.length === 0) {
      return [];
    }

    const conditions: SQL[] = [];
    if (query.domainIds !== "all") conditions.push(inArray(sentEmails.domainId, query.domainIds));
    if (query.domainId) conditions.push(eq(sentEmails.domainId, query.domainId));
    if (query.from) conditions.push(gte(sentEmails.sentAt, query.from));
    if (query.to) conditions.push(lte(sentEmails.sentAt, query.to));
    if (query.cursor) {
      const after = or(
        lt(sentEmails.sentAt, query.cursor.sentAt),
        and(eq(sentEmails.sentAt, query.cursor.sentAt), lt(sentEmails.id, query.cursor.id)),
      );
      if (after) conditions.push(after);
    }

    // Bodies and bcc are never read for listings
    return this.db
      .select({
        id: sentEmails.id,
        messageId: sentEmails.messageId,
        sentAt: sentEmails.sentAt,
        fromAddress: sentEmails.fromAddress,
        toAddresses: sentEmails.toAddresses,
        subject: sentEmails.subject,
        domainId: sentEmails.domainId,
        apiKeyId: sentEmails.apiKeyId,
      })
      .from(sentEmails)
      .where(and(...conditions))
      .orderBy(desc(sentEmails.sentAt), desc(sentEmails.id))
      .limit(query.limit);
  }

  async deleteSentBefore(cutoff: Date, limit: number): Promise<number> {
    const chunk = this.db
      .select({ id: sentEmails.id })
      .from(sentEmails)
      .where(lt(sentEmails.sentAt, cutoff))
      .limit(limit);
    const deleted = await this.db
      .delete(sentEmails)
      .where(inArray(sentEmails.id, chunk))
      .returning({ id: sentEmails.id });
    return deleted.length;
  }
}
