import type { DnsRecord } from "@relaymail/types";

export interface IdentityProvisioning {
  /** Opaque reference stored on the domain row. */
  identityRef: string;
  /** Records the domain owner must publish, in provider order. */
  records: DnsRecord[];
}

export interface VerificationDetails {
  verified: boolean;
  /** Provider DKIM status, e.g. PENDING, SUCCESS, FAILED. */
  status: string;
  signingAttributesOrigin: string;
  tokens: string[];
}

export interface ProviderHealth {
  healthy: boolean;
  issues: string[];
}

export interface IIdentityProvider {
  readonly name: string;

  createIdentity(domainName: string): Promise<IdentityProvisioning>;
  /** True once the provider has confirmed the domain's records itself. */
  isVerified(domainName: string): Promise<boolean>;
  getVerificationDetails(domainName: string): Promise<VerificationDetails>;
  /** Missing identities are not an error. */
  deleteIdentity(domainName: string): Promise<void>;
}
