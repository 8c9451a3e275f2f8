import { describe, it, expect } from "vitest";
import { parseEnv } from "./env.js";

const ADMIN_HASH = "pbkdf2$1000$00112233445566778899aabbccddeeff$abcdef0123456789";

function makeValidEnv(
  overrides: Record<string, string | undefined> = {},
): Record<string, string | undefined> {
  return {
    NODE_ENV: "test",
    PORT: "3000",
    LOG_LEVEL: "info",
    DATABASE_URL: "postgresql://localhost:5432/relaymail",
    REDIS_URL: "redis://localhost:6379",
    SESSION_SECRET: "test-secret-test-secret-test-secret",
    ADMIN_PASSWORD_HASH: ADMIN_HASH,
    CORS_ORIGINS: "https://admin.example.com",
    AWS_REGION: "us-east-1",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("parses valid env and applies defaults", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.port).toBe(3000);
    expect(config.database).toEqual({
      url: "postgresql://localhost:5432/relaymail",
      poolMax: 20,
    });
    expect(config.auth.sessionExpiryDays).toBe(30);
    expect(config.auth.adminPasswordHash).toBe(ADMIN_HASH);
    expect(config.aws).toEqual({
      region: "us-east-1",
      accessKeyId: undefined,
      secretAccessKey: undefined,
    });
    expect(config.cloudflare).toBeNull();
    expect(config.verification).toEqual({
      timeoutHours: 72,
      pollIntervalMinutes: 5,
      providerTimeoutMs: 10000,
    });
    expect(config.rateLimit).toEqual({ loginPerMinute: 5, apiPerMinute: 100 });
    expect(config.retention).toEqual({ sentEmailDays: null, apiKeyDays: 90 });
  });

  it("defaults LOG_LEVEL to info", () => {
    expect(parseEnv(makeValidEnv({ LOG_LEVEL: undefined })).logLevel).toBe("info");
  });

  it("splits comma-separated CORS_ORIGINS", () => {
    const config = parseEnv(makeValidEnv({ CORS_ORIGINS: "https://a.com, https://b.com" }));
    expect(config.cors.origins).toEqual(["https://a.com", "https://b.com"]);
  });

  it("rejects a wildcard anywhere in CORS_ORIGINS", () => {
    expect(() => parseEnv(makeValidEnv({ CORS_ORIGINS: "*" }))).toThrow();
    expect(() => parseEnv(makeValidEnv({ CORS_ORIGINS: "https://a.com, *" }))).toThrow();
  });

  it("rejects a non-postgres DATABASE_URL", () => {
    expect(() => parseEnv(makeValidEnv({ DATABASE_URL: "mysql://localhost" }))).toThrow();
  });

  it("rejects a short SESSION_SECRET", () => {
    expect(() => parseEnv(makeValidEnv({ SESSION_SECRET: "short" }))).toThrow();
  });

  it("rejects an ADMIN_PASSWORD_HASH in the wrong format", () => {
    expect(() => parseEnv(makeValidEnv({ ADMIN_PASSWORD_HASH: "plaintext" }))).toThrow();
  });

  it("rejects a missing AWS_REGION", () => {
    expect(() => parseEnv(makeValidEnv({ AWS_REGION: undefined }))).toThrow();
  });

  it("builds the cloudflare block when both values are set", () => {
    const config = parseEnv(
      makeValidEnv({ CLOUDFLARE_API_TOKEN: "test-token", CLOUDFLARE_ZONE_ID: "zone-1" }),
    );
    expect(config.cloudflare).toEqual({ apiToken: "test-token", zoneId: "zone-1" });
  });

  it("rejects a cloudflare token without a zone", () => {
    expect(() => parseEnv(makeValidEnv({ CLOUDFLARE_API_TOKEN: "test-token" }))).toThrow(
      /must be set together/,
    );
  });

  it("rejects half of an AWS credential pair", () => {
    expect(() => parseEnv(makeValidEnv({ AWS_ACCESS_KEY_ID: "test-id" }))).toThrow();
  });

  it("treats SENT_EMAIL_RETENTION_DAYS=0 as disabled", () => {
    expect(parseEnv(makeValidEnv({ SENT_EMAIL_RETENTION_DAYS: "0" })).retention.sentEmailDays).toBeNull();
    expect(parseEnv(makeValidEnv({ SENT_EMAIL_RETENTION_DAYS: "30" })).retention.sentEmailDays).toBe(30);
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv(makeValidEnv({ NODE_ENV: "staging" }))).toThrow();
  });
});
