import type { LogBuffer, Logger } from "@relaymail/logger";
import type { AppConfig } from "@relaymail/types";
import type { ApiKeyValidator, RateLimitStore } from "@relaymail/auth";
import type {
  ApiKeyService,
  AuditSink,
  AuditStore,
  DomainService,
  DomainVerificationService,
  EmailService,
} from "@relaymail/core";
import type { IEmailSender } from "@relaymail/providers";

/**
 * Everything the HTTP layer needs, built once in main and by tests.
 */
export interface ApiContext {
  config: Pick<AppConfig, "nodeEnv" | "auth" | "cors" | "rateLimit">;
  version: string;
  logger: Logger;
  /** Recent log lines served by GET /system/logs. */
  logs: LogBuffer;
  validator: ApiKeyValidator;
  domains: DomainService;
  verification: DomainVerificationService;
  emails: EmailService;
  apiKeys: ApiKeyService;
  auditLog: AuditStore;
  audit: AuditSink;
  sender: IEmailSender;
  /** Rejects when the database cannot be reached. */
  pingDatabase: () => Promise<void>;
  rateLimitStore?: RateLimitStore;
  /** Clock for the rate limiters. */
  now?: () => number;
}
