import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ApiKey } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import { generateKeySalt, hashApiKey } from "@relaymail/crypto";
import { ApiKeyValidator } from "./api-key-validator.js";
import type { ApiKeyLookup } from "./api-key-validator.js";

const RAW_KEY = "re_TestKeyTestKeyTestKeyTestKey12";

function makeApiKey(overrides: Partial<ApiKey> = {}, rawKey = RAW_KEY): ApiKey {
  const keySalt = generateKeySalt();
  return {
    id: "key-1",
    name: "ci",
    keyHash: hashApiKey(rawKey, keySalt),
    keySalt,
    keyPrefix: rawKey.slice(0, 11),
    isAdmin: false,
    createdAt: new Date("2026-01-01T00:00:00Z"),
    revokedAt: null,
    lastUsedAt: null,
    lastUsedIp: null,
    allowedDomainIds: ["dom-a"],
    ...overrides,
  };
}

describe("ApiKeyValidator", () => {
  const now = new Date("2026-03-01T12:00:00Z");
  let lookup: { findActiveByPrefix: ReturnType<typeof vi.fn>; recordUsage: ReturnType<typeof vi.fn> };
  let logger: { warn: ReturnType<typeof vi.fn> };
  let validator: ApiKeyValidator;

  beforeEach(() => {
    lookup = {
      findActiveByPrefix: vi.fn().mockResolvedValue([]),
      recordUsage: vi.fn().mockResolvedValue(undefined),
    };
    logger = { warn: vi.fn() };
    validator = new ApiKeyValidator(
      lookup as unknown as ApiKeyLookup,
      logger as unknown as Logger,
      () => now,
    );
  });

  it("resolves a scoped key to its allow-list", async () => {
    lookup.findActiveByPrefix.mockResolvedValue([makeApiKey()]);

    const context = await validator.validate(RAW_KEY, "10.0.0.1");

    expect(context).toEqual({
      actorType: "api_key",
      actorId: "re_TestKeyT",
      apiKeyId: "key-1",
      isAdmin: false,
      allowedDomainIds: ["dom-a"],
    });
    expect(lookup.findActiveByPrefix).toHaveBeenCalledWith("re_TestKeyT");
  });

  it("resolves an admin key to every domain", async () => {
    lookup.findActiveByPrefix.mockResolvedValue([makeApiKey({ isAdmin: true, allowedDomainIds: [] })]);

    const context = await validator.validate(RAW_KEY, null);

    expect(context?.isAdmin).toBe(true);
    expect(context?.allowedDomainIds).toBe("all");
  });

  it("records usage with time and ip", async () => {
    lookup.findActiveByPrefix.mockResolvedValue([makeApiKey()]);

    await validator.validate(RAW_KEY, "10.0.0.1");

    expect(lookup.recordUsage).toHaveBeenCalledWith("key-1", now, "10.0.0.1");
  });

  it("still authenticates when recording usage fails", async () => {
    lookup.findActiveByPrefix.mockResolvedValue([makeApiKey()]);
    lookup.recordUsage.mockRejectedValue(new Error("db down"));

    const context = await validator.validate(RAW_KEY, null);

    expect(context?.apiKeyId).toBe("key-1");
    expect(logger.warn).toHaveBeenCalledOnce();
  });

  it("rejects malformed keys without a lookup", async () => {
    await expect(validator.validate("sk_live_nope", null)).resolves.toBeNull();
    await expect(validator.validate("re_short", null)).resolves.toBeNull();
    expect(lookup.findActiveByPrefix).not.toHaveBeenCalled();
  });

  it("rejects unknown keys", async () => {
    await expect(validator.validate(RAW_KEY, null)).resolves.toBeNull();
    expect(lookup.recordUsage).not.toHaveBeenCalled();
  });

  it("rejects a key whose hash does not match the prefix candidate", async () => {
    lookup.findActiveByPrefix.mockResolvedValue([makeApiKey({}, "re_TestKeyTOTHERTestKeyTestKey12")]);

    await expect(validator.validate(RAW_KEY, null)).resolves.toBeNull();
  });

  it("picks the matching key among prefix collisions", async () => {
    lookup.findActiveByPrefix.mockResolvedValue([
      makeApiKey({ id: "key-other" }, "re_TestKeyTOTHERTestKeyTestKey12"),
      makeApiKey({ id: "key-mine" }),
    ]);

    const context = await validator.validate(RAW_KEY, null);

    expect(context?.apiKeyId).toBe("key-mine");
  });

  it("rejects a revoked key even if the store returns it", async () => {
    lookup.findActiveByPrefix.mockResolvedValue([makeApiKey({ revokedAt: new Date() })]);

    await expect(validator.validate(RAW_KEY, null)).resolves.toBeNull();
  });
});
