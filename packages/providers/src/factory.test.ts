import { describe, it, expect } from "vitest";
import type { AppConfig } from "@relaymail/types";
import { createLogger } from "@relaymail/logger";
import { createProviders } from "./factory.js";
import { CloudflarePublisher } from "./cloudflare-publisher.js";
import { NoopDnsPublisher } from "./noop-publisher.js";

const baseConfig: AppConfig = {
  nodeEnv: "test",
  port: 3000,
  logLevel: "info",
  database: { url: "postgresql://localhost:5432/relaymail", poolMax: 5 },
  redis: { url: "redis://localhost:6379" },
  auth: { sessionSecret: "test-secret-test-secret-test-secret", sessionExpiryDays: 30, adminPasswordHash: "pbkdf2$1$00$00" },
  cors: { origins: [] },
  aws: { region: "us-east-1" },
  cloudflare: null,
  verification: { timeoutHours: 72, pollIntervalMinutes: 5, providerTimeoutMs: 10_000 },
  rateLimit: { loginPerMinute: 5, apiPerMinute: 100 },
  retention: { sentEmailDays: null, apiKeyDays: 90 },
};

describe("createProviders", () => {
  const logger = createLogger({ level: "silent" });

  it("uses one SES client for identities and sending", () => {
    const providers = createProviders(baseConfig, logger);
    expect(providers.identity).toBe(providers.sender);
    expect(providers.identity.name).toBe("ses");
  });

  it("leaves DNS publishing to the operator without Cloudflare", () => {
    const { publisher } = createProviders(baseConfig, logger);
    expect(publisher).toBeInstanceOf(NoopDnsPublisher);
    expect(publisher.enabled).toBe(false);
  });

  it("publishes through Cloudflare when it is configured", () => {
    const { publisher } = createProviders(
      { ...baseConfig, cloudflare: { apiToken: "test-token", zoneId: "zone-1" } },
      logger,
    );
    expect(publisher).toBeInstanceOf(CloudflarePublisher);
    expect(publisher.enabled).toBe(true);
  });
});

describe("NoopDnsPublisher", () => {
  it("creates and deletes nothing", async () => {
    const publisher = new NoopDnsPublisher(createLogger({ level: "silent" }));
    await expect(
      publisher.createRecord({ type: "TXT", name: "example.com", value: "v=spf1", priority: 0 }),
    ).resolves.toBe("");
    await expect(publisher.deleteRecordsForDomain("example.com")).resolves.toBe(0);
  });
});
