export type DomainStatus = "pending" | "verifying" | "verified" | "failed";

export type DnsRecordType = "CNAME" | "TXT" | "MX";

export interface DnsRecord {
  type: DnsRecordType;
  name: string;
  value: string;
  priority: number;
  /** Result of the last direct DNS lookup. Advisory only. */
  verified: boolean;
}

export interface Domain {
  id: string;
  name: string;
  status: DomainStatus;
  createdAt: Date;
  verificationStartedAt: Date | null;
  verifiedAt: Date | null;
  lastCheckedAt: Date | null;
  failureReason: string | null;
  providerIdentityRef: string | null;
  dnsRecords: DnsRecord[] | null;
}

/**
 * Columns a single state-machine step may change. Applied as one row update.
 */
export type DomainPatch = Partial<
  Pick<
    Domain,
    | "status"
    | "verificationStartedAt"
    | "verifiedAt"
    | "lastCheckedAt"
    | "failureReason"
    | "providerIdentityRef"
    | "dnsRecords"
  >
>;
