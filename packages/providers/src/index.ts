export type {
  IIdentityProvider,
  IdentityProvisioning,
  VerificationDetails,
  ProviderHealth,
} from "./identity-provider.interface.js";
export type { IEmailSender, OutboundEmail } from "./email-sender.interface.js";
export type { IDnsPublisher, DnsRecordInput } from "./dns-publisher.interface.js";
export type { IDnsResolver, DnsCheckResult } from "./dns-resolver.interface.js";

export { SesProvider, dkimRecords } from "./ses-provider.js";
export type { SesProviderConfig } from "./ses-provider.js";
export { CloudflarePublisher, CloudflareRejectedError } from "./cloudflare-publisher.js";
export type { CloudflarePublisherConfig } from "./cloudflare-publisher.js";
export { NoopDnsPublisher } from "./noop-publisher.js";
export { NodeDnsResolver, normalizeDnsValue } from "./node-dns-resolver.js";
export type { DnsLookup, NodeDnsResolverConfig } from "./node-dns-resolver.js";
export { createProviders, createDnsPublisher } from "./factory.js";
export type { Providers } from "./factory.js";
