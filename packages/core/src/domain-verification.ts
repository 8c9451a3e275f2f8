import type { DnsRecord, Domain, DomainPatch } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import type {
  DnsCheckResult,
  IDnsPublisher,
  IDnsResolver,
  IIdentityProvider,
  IdentityProvisioning,
  VerificationDetails,
} from "@relaymail/providers";
import { NotFoundError, errorMessage } from "@relaymail/errors";
import type { DomainStore } from "./stores.interface.js";
import type { AuditSink } from "./audit-recorder.js";

interface CheckResult {
  domain: Domain | null;
  /** `superseded` when another check or a delete got to the row first. */
  outcome: "verified" | "failed" | "pending" | "superseded";
}

export interface DomainVerificationDependencies {
  domains: DomainStore;
  identity: IIdentityProvider;
  publisher: IDnsPublisher;
  resolver: IDnsResolver;
  audit: AuditSink;
  logger: Logger;
  /** Verifying domains older than this fail on their next check. */
  timeoutHours: number;
  pollIntervalMinutes: number;
  now?: () => Date;
}

export interface PollSummary {
  checked: number;
  verified: number;
  failed: number;
  /** True when the run stopped early on abort. */
  aborted: boolean;
}

export interface RecordDiagnostics extends DnsRecord {
  dns: DnsCheckResult;
}

export interface DomainDiagnostics {
  domainId: string;
  name: string;
  status: Domain["status"];
  provider: VerificationDetails;
  records: RecordDiagnostics[];
}

/**
 * Drives a domain through pending → verifying → verified | failed.
 *
 * The identity provider decides verification. Direct DNS lookups only
 * annotate the stored records for operators. Each step ends in one row
 * update.
 */
export class DomainVerificationService {
  private readonly domains: DomainStore;
  private readonly identity: IIdentityProvider;
  private readonly publisher: IDnsPublisher;
  private readonly resolver: IDnsResolver;
  private readonly audit: AuditSink;
  private readonly logger: Logger;
  private readonly timeoutHours: number;
  private readonly pollIntervalMs: number;
  private readonly now: () => Date;

  constructor(deps: DomainVerificationDependencies) {
    this.domains = deps.domains;
    this.identity = deps.identity;
    this.publisher = deps.publisher;
    this.resolver = deps.resolver;
    this.audit = deps.audit;
    this.logger = deps.logger;
    this.timeoutHours = deps.timeoutHours;
    this.pollIntervalMs = deps.pollIntervalMinutes * 60_000;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Provision the sender identity and publish its records. Safe to run more
   * than once: anything but a pending domain is left alone.
   */
  async setup(domainId: string): Promise<Domain | null> {
    const domain = await this.domains.findById(domainId);
    if (!domain) {
      this.logger.warn({ domainId }, "Domain not found, skipping setup");
      return null;
    }
    if (domain.status !== "pending") {
      this.logger.info({ domainId, status: domain.status }, "Domain is not pending, skipping setup");
      return domain;
    }

    const log = this.logger.child({ domainId, domain: domain.name });

    let provisioning: IdentityProvisioning;
    try {
      provisioning = await this.identity.createIdentity(domain.name);
    } catch (err) {
      const reason = `Setup failed: ${errorMessage(err)}`;
      log.error({ error: errorMessage(err) }, "Identity creation failed");
      const failed = await this.domains.transition(domain.id, "pending", { status: "failed", failureReason: reason });
      if (!failed) return this.domains.findById(domain.id);
      this.recordOutcome(domain, "domain.setup", 500, { errorMessage: reason });
      return failed;
    }

    let published = 0;
    let publishFailures = 0;
    if (this.publisher.enabled) {
      for (const record of provisioning.records) {
        try {
          await this.publisher.createRecord(record);
          published++;
        } catch (err) {
          publishFailures++;
          log.warn(
            { type: record.type, name: record.name, error: errorMessage(err) },
            "Failed to publish DNS record",
          );
        }
      }
    }

    const updated = await this.domains.transition(domain.id, "pending", {
      status: "verifying",
      providerIdentityRef: provisioning.identityRef,
      dnsRecords: provisioning.records,
      verificationStartedAt: this.now(),
    });
    if (!updated) {
      log.warn("Domain left pending during setup, not starting verification");
      return this.domains.findById(domain.id);
    }

    log.info(
      { records: provisioning.records.length, published, publishFailures },
      "Domain setup complete, verification started",
    );
    this.recordOutcome(domain, "domain.setup", 200, {
      details: { records: provisioning.records.length, published, publishFailures },
    });
    return updated;
  }

  /**
   * One scheduled pass over every verifying domain.
   */
  async pollAll(signal?: AbortSignal): Promise<PollSummary> {
    const domains = await this.domains.listByStatus("verifying");
    const summary: PollSummary = { checked: 0, verified: 0, failed: 0, aborted: false };

    for (const domain of domains) {
      if (signal?.aborted) {
        summary.aborted = true;
        break;
      }
      try {
        const { outcome } = await this.check(domain);
        summary.checked++;
        if (outcome === "verified") summary.verified++;
        if (outcome === "failed") summary.failed++;
      } catch (err) {
        this.logger.error({ domainId: domain.id, error: errorMessage(err) }, "Domain check failed");
      }
    }

    this.logger.info(summary, "Verification poll finished");
    return summary;
  }

  /**
   * Manual "check now". Domains that are not verifying come back unchanged.
   */
  async checkNow(domainId: string): Promise<Domain> {
    const domain = await this.domains.findById(domainId);
    if (!domain) {
      throw new NotFoundError("Domain not found");
    }
    if (domain.status !== "verifying") {
      this.logger.info({ domainId, status: domain.status }, "Domain is not verifying, check skipped");
      return domain;
    }

    const { domain: checked } = await this.check(domain);
    if (!checked) {
      throw new NotFoundError("Domain not found");
    }
    return checked;
  }

  /**
   * Live provider status and DNS visibility. Changes nothing.
   */
  async diagnostics(domain: Domain): Promise<DomainDiagnostics> {
    const [provider, records] = await Promise.all([
      this.identity.getVerificationDetails(domain.name),
      Promise.all(
        (domain.dnsRecords ?? []).map(async (record) => ({
          ...record,
          dns: await this.resolver.checkRecord(record.type, record.name, record.value),
        })),
      ),
    ]);

    return { domainId: domain.id, name: domain.name, status: domain.status, provider, records };
  }

  /**
   * When the scheduler will next look at a verifying domain.
   */
  nextCheckAt(domain: Domain): Date | null {
    if (domain.status !== "verifying") return null;
    const last = domain.lastCheckedAt ?? domain.verificationStartedAt ?? domain.createdAt;
    return new Date(last.getTime() + this.pollIntervalMs);
  }

  /**
   * Every write is conditional on the row still being `verifying`, so a
   * check that raced another one (scheduled against manual) leaves the
   * winner's result alone.
   */
  private async check(domain: Domain): Promise<CheckResult> {
    const now = this.now();
    const startedAt = domain.verificationStartedAt ?? domain.createdAt;

    if (now.getTime() - startedAt.getTime() > this.timeoutHours * 3_600_000) {
      const reason = `Verification timed out after ${String(this.timeoutHours)} hours`;
      const failed = await this.domains.transition(domain.id, "verifying", {
        status: "failed",
        failureReason: reason,
        lastCheckedAt: now,
      });
      if (!failed) return this.superseded(domain);
      this.logger.warn({ domainId: domain.id, domain: domain.name }, "Domain verification timed out");
      this.recordOutcome(domain, "domain.failed", 200, { errorMessage: reason });
      return { domain: failed, outcome: "failed" };
    }

    let verified = false;
    try {
      verified = await this.identity.isVerified(domain.name);
    } catch (err) {
      this.logger.warn(
        { domainId: domain.id, error: errorMessage(err) },
        "Provider check failed, retrying next cycle",
      );
    }

    if (verified) {
      const done = await this.domains.transition(domain.id, "verifying", {
        status: "verified",
        verifiedAt: now,
        lastCheckedAt: now,
      });
      if (!done) return this.superseded(domain);
      this.logger.info({ domainId: domain.id, domain: domain.name }, "Domain verified");
      this.recordOutcome(domain, "domain.verified", 200);
      return { domain: done, outcome: "verified" };
    }

    const patch: DomainPatch = { lastCheckedAt: now };
    if (domain.dnsRecords && domain.dnsRecords.length > 0) {
      const annotated = await this.annotate(domain, domain.dnsRecords);
      patch.dnsRecords = annotated;
      this.logger.debug(
        { domainId: domain.id, visible: annotated.filter((r) => r.verified).length, total: annotated.length },
        "Domain not yet verified by provider",
      );
    }
    const checked = await this.domains.transition(domain.id, "verifying", patch);
    if (!checked) return this.superseded(domain);
    return { domain: checked, outcome: "pending" };
  }

  private async superseded(domain: Domain): Promise<CheckResult> {
    const current = await this.domains.findById(domain.id);
    this.logger.info(
      { domainId: domain.id, status: current?.status ?? "deleted" },
      "Domain changed during check, leaving it as is",
    );
    return { domain: current, outcome: "superseded" };
  }

  private async annotate(domain: Domain, records: DnsRecord[]): Promise<DnsRecord[]> {
    return Promise.all(
      records.map(async (record) => {
        try {
          const result = await this.resolver.checkRecord(record.type, record.name, record.value);
          return { ...record, verified: result.verified };
        } catch (err) {
          this.logger.warn(
            { domainId: domain.id, name: record.name, error: errorMessage(err) },
            "DNS lookup failed",
          );
          return { ...record, verified: false };
        }
      }),
    );
  }

  private recordOutcome(
    domain: Domain,
    action: "domain.setup" | "domain.verified" | "domain.failed",
    statusCode: number,
    extra: { errorMessage?: string; details?: Record<string, unknown> } = {},
  ): void {
    this.audit.record({
      action,
      actorType: "system",
      actorId: null,
      resourceType: "domain",
      resourceId: domain.id,
      statusCode,
      details: { domain: domain.name, ...extra.details },
      ...(extra.errorMessage ? { errorMessage: extra.errorMessage } : {}),
    });
  }
}
