import { describe, it, expect } from "vitest";
import { groupDomainIds, toApiKey, toDomain } from "./mappers.js";
import { PG_UNIQUE_VIOLATION, pgErrorCode } from "./pg-errors.js";

const T0 = new Date("2026-03-01T12:00:00.000Z");

describe("toDomain", () => {
  it("parses the stored record set", () => {
    const domain = toDomain({
      id: "d1",
      name: "example.com",
      status: "verifying",
      createdAt: T0,
      verificationStartedAt: T0,
      verifiedAt: null,
      lastCheckedAt: null,
      failureReason: null,
      providerIdentityRef: "example.com",
      dnsRecords:
        '[{"type":"CNAME","name":"t._domainkey.example.com","value":"t.dkim.example.net","priority":0,"verified":false}]',
    });

    expect(domain.dnsRecords).toEqual([
      { type: "CNAME", name: "t._domainkey.example.com", value: "t.dkim.example.net", priority: 0, verified: false },
    ]);
    expect(domain.status).toBe("verifying");
  });
});

describe("groupDomainIds", () => {
  it("keeps keys without rows", () => {
    const grouped = groupDomainIds(
      ["k1", "k2"],
      [
        { apiKeyId: "k1", domainId: "d1" },
        { apiKeyId: "k1", domainId: "d2" },
      ],
    );

    expect(grouped.get("k1")).toEqual(["d1", "d2"]);
    expect(grouped.get("k2")).toEqual([]);
  });

  it("feeds the allow-list of a key", () => {
    const key = toApiKey(
      {
        id: "k1",
        name: "ci",
        keyHash: "hash",
        keySalt: "salt",
        keyPrefix: "re_abcdefgh",
        isAdmin: false,
        createdAt: T0,
        revokedAt: null,
        lastUsedAt: null,
        lastUsedIp: null,
      },
      ["d1"],
    );
    expect(key.allowedDomainIds).toEqual(["d1"]);
  });
});

describe("pgErrorCode", () => {
  it("reads the code from the error or its cause", () => {
    expect(pgErrorCode({ code: "23505" })).toBe(PG_UNIQUE_VIOLATION);
    expect(pgErrorCode(new Error("Failed query", { cause: { code: "23503" } }))).toBe("23503");
    expect(pgErrorCode(new Error("plain"))).toBeUndefined();
    expect(pgErrorCode("23505")).toBeUndefined();
  });
});
