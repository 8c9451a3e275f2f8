import type { Logger } from "@relaymail/logger";
import type { DomainVerificationService, PollSummary } from "@relaymail/core";

export interface DomainVerifyDeps {
  verification: DomainVerificationService;
  logger: Logger;
  signal: AbortSignal;
}

export async function processDomainVerify(deps: DomainVerifyDeps): Promise<PollSummary> {
  const summary = await deps.verification.pollAll(deps.signal);
  if (summary.aborted) {
    deps.logger.warn(summary, "Verification poll interrupted by shutdown");
  }
  return summary;
}
