import type {
  ApiKey,
  ArchivedApiKey,
  AuditEntry,
  AuditLog,
  AuditQuery,
  Domain,
  DomainPatch,
  DomainStatus,
  Paginated,
  PaginationParams,
  SentEmail,
  SentEmailQuery,
  SentEmailSummary,
} from "@relaymail/types";
import type { ApiKeyLookup } from "@relaymail/auth";

export interface NewDomain {
  id: string;
  name: string;
  createdAt: Date;
}

export interface DomainListQuery extends PaginationParams {
  domainIds: string[] | "all";
}

export interface DomainStore {
  /**
   * Insert a `pending` domain. When `grantToApiKeyId` is given the key's
   * allow-list gains the domain in the same transaction.
   *
   * @throws DomainExistsError when the name is already taken
   */
  insert(domain: NewDomain, grantToApiKeyId?: string | null): Promise<Domain>;
  findById(id: string): Promise<Domain | null>;
  findByName(name: string): Promise<Domain | null>;
  /** Newest first. */
  list(query: DomainListQuery): Promise<Paginated<Domain>>;
  listByStatus(status: DomainStatus): Promise<Domain[]>;
  /** Applies the patch as a single row update; null when the row is gone. */
  update(id: string, patch: DomainPatch): Promise<Domain | null>;
  /**
   * Like `update`, but only while the row still has status `from`. Null when
   * the row is gone or has moved on; the row is then left untouched.
   */
  transition(id: string, from: DomainStatus, patch: DomainPatch): Promise<Domain | null>;
  countActiveKeyReferences(id: string): Promise<number>;
  /**
   * Clear allow-list rows of revoked keys and delete the domain in one
   * transaction.
   *
   * @throws ConflictError (`domain_in_use`) while an active key lists the domain
   */
  delete(id: string): Promise<boolean>;
}

export type NewApiKey = Omit<ApiKey, "revokedAt" | "lastUsedAt" | "lastUsedIp">;

export interface ApiKeyStore extends ApiKeyLookup {
  insert(key: NewApiKey): Promise<ApiKey>;
  findById(id: string): Promise<ApiKey | null>;
  /** Newest first, revoked keys included. */
  list(params: PaginationParams): Promise<Paginated<ApiKey>>;
  /** Sets `revokedAt` once; a second call returns the key unchanged. */
  revoke(id: string, at: Date): Promise<ApiKey | null>;
  findArchived(id: string): Promise<ArchivedApiKey | null>;
  listArchived(params: PaginationParams): Promise<Paginated<ArchivedApiKey>>;
  /**
   * Copy up to `limit` keys revoked before `cutoff` into the archive and
   * delete them, in one transaction. Returns the number moved.
   */
  archiveRevokedBefore(cutoff: Date, limit: number, archivedAt: Date): Promise<number>;
}

export interface AuditRecord extends AuditEntry {
  timestamp: Date;
}

export interface AuditStore {
  insertMany(entries: AuditRecord[]): Promise<void>;
  /** Newest first. */
  list(query: AuditQuery): Promise<Paginated<AuditLog>>;
}

export interface SentEmailStore {
  insert(email: SentEmail): Promise<void>;
  findById(id: string): Promise<SentEmail | null>;
  /** Ordered by (sentAt desc, id desc), at most `query.limit` rows, bodies not loaded. */
  list(query: SentEmailQuery): Promise<SentEmailSummary[]>;
  /** Deletes at most `limit` emails sent before `cutoff`. */
  deleteSentBefore(cutoff: Date, limit: number): Promise<number>;
}
