import type { AppConfig } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import type { IIdentityProvider } from "./identity-provider.interface.js";
import type { IEmailSender } from "./email-sender.interface.js";
import type { IDnsPublisher } from "./dns-publisher.interface.js";
import type { IDnsResolver } from "./dns-resolver.interface.js";
import { SesProvider } from "./ses-provider.js";
import { CloudflarePublisher } from "./cloudflare-publisher.js";
import { NoopDnsPublisher } from "./noop-publisher.js";
import { NodeDnsResolver } from "./node-dns-resolver.js";

export interface Providers {
  identity: IIdentityProvider;
  sender: IEmailSender;
  publisher: IDnsPublisher;
  resolver: IDnsResolver;
}

export function createDnsPublisher(config: AppConfig, logger: Logger): IDnsPublisher {
  if (!config.cloudflare) {
    return new NoopDnsPublisher(logger.child({ component: "dns-publisher" }));
  }
  return new CloudflarePublisher({
    apiToken: config.cloudflare.apiToken,
    zoneId: config.cloudflare.zoneId,
    timeoutMs: config.verification.providerTimeoutMs,
    logger: logger.child({ component: "cloudflare" }),
  });
}

/**
 * Build every external collaborator from configuration.
 */
export function createProviders(config: AppConfig, logger: Logger): Providers {
  const ses = new SesProvider({
    region: config.aws.region,
    accessKeyId: config.aws.accessKeyId,
    secretAccessKey: config.aws.secretAccessKey,
    timeoutMs: config.verification.providerTimeoutMs,
    logger: logger.child({ component: "ses" }),
  });

  return {
    identity: ses,
    sender: ses,
    publisher: createDnsPublisher(config, logger),
    resolver: new NodeDnsResolver({
      logger: logger.child({ component: "dns-resolver" }),
      timeoutMs: config.verification.providerTimeoutMs,
    }),
  };
}
