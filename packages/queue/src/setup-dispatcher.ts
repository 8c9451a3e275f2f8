import type { Queue } from "bullmq";
import type { DomainSetupJobData } from "@relaymail/types";
import type { SetupDispatcher } from "@relaymail/core";

/**
 * Hands domain setup to the worker. The job id is derived from the domain,
 * so a repeated enqueue while a job is waiting is a no-op.
 */
export class BullMqSetupDispatcher implements SetupDispatcher {
  constructor(private readonly queue: Queue<DomainSetupJobData>) {}

  async enqueueSetup(domainId: string): Promise<void> {
    await this.queue.add("domain-setup", { type: "domain-setup", domainId }, { jobId: `setup-${domainId}` });
  }
}
