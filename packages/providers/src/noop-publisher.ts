import type { Logger } from "@relaymail/logger";
import type { DnsRecordInput, IDnsPublisher } from "./dns-publisher.interface.js";

/**
 * Used when no DNS provider is configured: records are left for the domain
 * owner to publish by hand.
 */
export class NoopDnsPublisher implements IDnsPublisher {
  readonly name = "manual";
  readonly enabled = false;

  constructor(private readonly logger: Logger) {}

  async createRecord(record: DnsRecordInput): Promise<string> {
    this.logger.debug({ type: record.type, name: record.name }, "DNS provisioning disabled, skipping record");
    return "";
  }

  async deleteRecordsForDomain(_domainName: string): Promise<number> {
    return 0;
  }
}
