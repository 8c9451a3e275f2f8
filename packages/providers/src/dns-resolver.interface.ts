import type { DnsRecordType } from "@relaymail/types";

export interface DnsCheckResult {
  found: boolean;
  actualValue: string | null;
  verified: boolean;
  /** Name server that answered, null when none did. */
  server: string | null;
}

export interface IDnsResolver {
  checkRecord(type: DnsRecordType, name: string, expectedValue: string): Promise<DnsCheckResult>;
}
