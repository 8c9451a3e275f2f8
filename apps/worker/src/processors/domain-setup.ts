import type { DomainSetupJobData } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import type { DomainVerificationService } from "@relaymail/core";

export interface DomainSetupDeps {
  verification: DomainVerificationService;
  logger: Logger;
}

/**
 * Provision the sender identity and DNS records of a new domain. Safe to run
 * twice: anything no longer pending is left alone.
 */
export async function processDomainSetup(data: DomainSetupJobData, deps: DomainSetupDeps): Promise<void> {
  const { domainId } = data;
  if (!domainId) {
    throw new Error("Missing required field: domainId");
  }

  const domain = await deps.verification.setup(domainId);
  if (!domain) {
    deps.logger.warn({ domainId }, "Setup job for a domain that no longer exists");
    return;
  }
  deps.logger.info({ domainId, domain: domain.name, status: domain.status }, "Domain setup finished");
}
