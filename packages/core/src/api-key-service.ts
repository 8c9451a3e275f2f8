import { randomUUID } from "node:crypto";
import { z } from "zod";
import type {
  ApiKey,
  ApiKeyState,
  ArchivedApiKey,
  Paginated,
  PaginationParams,
} from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import { generateApiKey, generateKeySalt, hashApiKey } from "@relaymail/crypto";
import { NotFoundError, ValidationError } from "@relaymail/errors";
import type { ApiKeyStore, DomainStore } from "./stores.interface.js";
import { parseInput } from "./validation.js";

export const createApiKeySchema = z.object({
  name: z.string({ required_error: "Name is required" }).trim().min(1, "Name is required").max(100),
  domainIds: z.array(z.string().min(1)).default([]),
  isAdmin: z.boolean().default(false),
});

export interface CreatedApiKey {
  key: ApiKey;
  /** The only time the raw secret is available. */
  rawKey: string;
}

/**
 * Lifecycle of a key: a live row without `revokedAt` is active, with it
 * revoked; a row in the archive table is archived.
 */
export function getApiKeyState(key: { revokedAt: Date | null; archivedAt?: Date | null }): ApiKeyState {
  if (key.archivedAt) return "archived";
  return key.revokedAt ? "revoked" : "active";
}

export interface ApiKeyServiceDependencies {
  keys: ApiKeyStore;
  domains: DomainStore;
  logger: Logger;
  now?: () => Date;
}

export class ApiKeyService {
  private readonly keys: ApiKeyStore;
  private readonly domains: DomainStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: ApiKeyServiceDependencies) {
    this.keys = deps.keys;
    this.domains = deps.domains;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  async create(input: unknown): Promise<CreatedApiKey> {
    const { name, isAdmin, domainIds } = parseInput(createApiKeySchema, input);
    const uniqueDomainIds = [...new Set(domainIds)];

    if (!isAdmin && uniqueDomainIds.length === 0) {
      throw new ValidationError("Non-admin keys must have at least one domain", {
        domainIds: "At least one domain is required",
      });
    }

    for (const domainId of uniqueDomainIds) {
      if (!(await this.domains.findById(domainId))) {
        throw new ValidationError(`Unknown domain: ${domainId}`, { domainIds: `Unknown domain: ${domainId}` });
      }
    }

    const { key: rawKey, prefix } = generateApiKey({ admin: isAdmin });
    const salt = generateKeySalt();

    const key = await this.keys.insert({
      id: randomUUID(),
      name,
      keyHash: hashApiKey(rawKey, salt),
      keySalt: salt,
      keyPrefix: prefix,
      isAdmin,
      createdAt: this.now(),
      allowedDomainIds: isAdmin ? [] : uniqueDomainIds,
    });

    this.logger.info({ apiKeyId: key.id, keyPrefix: prefix, isAdmin }, "API key created");
    return { key, rawKey };
  }

  async list(params: PaginationParams): Promise<Paginated<ApiKey>> {
    return this.keys.list(params);
  }

  async get(id: string): Promise<ApiKey> {
    const key = await this.keys.findById(id);
    if (!key) {
      throw new NotFoundError("API key not found");
    }
    return key;
  }

  async revoke(id: string): Promise<ApiKey> {
    const key = await this.keys.revoke(id, this.now());
    if (!key) {
      throw new NotFoundError("API key not found");
    }
    this.logger.info({ apiKeyId: id, keyPrefix: key.keyPrefix }, "API key revoked");
    return key;
  }

  async listArchived(params: PaginationParams): Promise<Paginated<ArchivedApiKey>> {
    return this.keys.listArchived(params);
  }

  /**
   * Where a key id currently sits in its lifecycle.
   */
  async state(id: string): Promise<ApiKeyState> {
    const live = await this.keys.findById(id);
    if (live) return getApiKeyState(live);

    const archived = await this.keys.findArchived(id);
    if (archived) return getApiKeyState(archived);

    throw new NotFoundError("API key not found");
  }
}
