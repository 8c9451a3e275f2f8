import type { Database } from "../client.js";
import { DomainRepository } from "./domain-repository.js";
import { ApiKeyRepository } from "./api-key-repository.js";
import { AuditRepository } from "./audit-repository.js";
import { SentEmailRepository } from "./sent-email-repository.js";

export { DomainRepository, ApiKeyRepository, AuditRepository, SentEmailRepository };

export function createRepositories({ db }: Database) {
  return {
    domains: new DomainRepository(db),
    apiKeys: new ApiKeyRepository(db),
    audit: new AuditRepository(db),
    sentEmails: new SentEmailRepository(db),
  };
}

export type Repositories = ReturnType<typeof createRepositories>;
