import { randomUUID } from "node:crypto";
import type { AuthContext, Domain, Paginated, PaginationParams } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import type { IDnsPublisher, IIdentityProvider } from "@relaymail/providers";
import { assertDomainAccess, domainScope } from "@relaymail/auth";
import { ConflictError, DomainExistsError, NotFoundError, errorMessage } from "@relaymail/errors";
import type { DomainStore } from "./stores.interface.js";
import { normalizeDomainName } from "./domain-name.js";

/**
 * Hands a new domain to the background setup step.
 */
export interface SetupDispatcher {
  enqueueSetup(domainId: string): Promise<void>;
}

export interface DomainServiceDependencies {
  domains: DomainStore;
  identity: IIdentityProvider;
  publisher: IDnsPublisher;
  dispatcher: SetupDispatcher;
  logger: Logger;
  now?: () => Date;
}

export class DomainService {
  private readonly domains: DomainStore;
  private readonly identity: IIdentityProvider;
  private readonly publisher: IDnsPublisher;
  private readonly dispatcher: SetupDispatcher;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: DomainServiceDependencies) {
    this.domains = deps.domains;
    this.identity = deps.identity;
    this.publisher = deps.publisher;
    this.dispatcher = deps.dispatcher;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Persist a pending domain and queue its setup. Scoped keys get the new
   * domain added to their allow-list.
   */
  async create(rawName: unknown, actor: AuthContext): Promise<Domain> {
    const name = normalizeDomainName(rawName);

    // Fast path only: the unique index settles concurrent creates.
    if (await this.domains.findByName(name)) {
      throw new DomainExistsError(name);
    }

    const domain = await this.domains.insert(
      { id: randomUUID(), name, createdAt: this.now() },
      actor.isAdmin ? null : actor.apiKeyId,
    );
    this.logger.info({ domainId: domain.id, domain: name }, "Domain created");

    try {
      await this.dispatcher.enqueueSetup(domain.id);
    } catch (err) {
      const reason = `Setup failed: could not schedule provisioning: ${errorMessage(err)}`;
      this.logger.error({ domainId: domain.id, error: errorMessage(err) }, "Failed to enqueue domain setup");
      const failed = await this.domains.transition(domain.id, "pending", { status: "failed", failureReason: reason });
      return failed ?? (await this.domains.findById(domain.id)) ?? domain;
    }

    return domain;
  }

  async list(params: PaginationParams, actor: AuthContext): Promise<Paginated<Domain>> {
    return this.domains.list({ ...params, domainIds: domainScope(actor) });
  }

  /**
   * Scope is checked before existence, so an out-of-scope id is `forbidden`
   * whether or not it exists.
   */
  async get(id: string, actor: AuthContext): Promise<Domain> {
    assertDomainAccess(actor, id);
    const domain = await this.domains.findById(id);
    if (!domain) {
      throw new NotFoundError("Domain not found");
    }
    return domain;
  }

  async delete(id: string, actor: AuthContext): Promise<Domain> {
    const domain = await this.get(id, actor);

    const references = await this.domains.countActiveKeyReferences(domain.id);
    if (references > 0) {
      throw new ConflictError(
        `Domain is assigned to ${String(references)} active API key(s); revoke or reassign them first`,
        "domain_in_use",
      );
    }

    // Row first: the store re-checks references inside its transaction, and
    // provider cleanup must not run for a domain that stays.
    const deleted = await this.domains.delete(domain.id);
    if (!deleted) {
      throw new NotFoundError("Domain not found");
    }

    try {
      await this.identity.deleteIdentity(domain.name);
    } catch (err) {
      this.logger.warn({ domainId: domain.id, error: errorMessage(err) }, "Failed to delete provider identity");
    }

    if (this.publisher.enabled) {
      try {
        const removed = await this.publisher.deleteRecordsForDomain(domain.name);
        this.logger.info({ domainId: domain.id, removed }, "Removed published DNS records");
      } catch (err) {
        this.logger.warn({ domainId: domain.id, error: errorMessage(err) }, "Failed to remove DNS records");
      }
    }

    this.logger.info({ domainId: domain.id, domain: domain.name }, "Domain deleted");
    return domain;
  }
}
