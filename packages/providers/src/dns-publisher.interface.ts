import type { DnsRecordType } from "@relaymail/types";

export interface DnsRecordInput {
  type: DnsRecordType;
  name: string;
  value: string;
  priority: number;
}

export interface IDnsPublisher {
  readonly name: string;
  /** False for the publisher used when no DNS provider is configured. */
  readonly enabled: boolean;

  /** Returns the provider's record id. */
  createRecord(record: DnsRecordInput): Promise<string>;
  /** Removes every record at or below `domainName`. Returns the number removed. */
  deleteRecordsForDomain(domainName: string): Promise<number>;
}
