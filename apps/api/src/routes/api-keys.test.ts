import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createLogger } from "@relaymail/logger";
import { archiveRevokedKeys } from "@relaymail/core";
import { NOW, startTestServer } from "../test-harness.js";
import type { TestServer } from "../test-harness.js";

const DAY = 86_400_000;

describe("API key routes", () => {
  let server: TestServer;
  let domainId: string;

  beforeEach(async () => {
    server = await startTestServer();
    domainId = await server.addDomain("example.com");
  });

  afterEach(async () => {
    await server.close();
  });

  it("returns the raw key once on creation", async () => {
    const res = await server.request("/api-keys", {
      method: "POST",
      key: server.adminKey,
      json: { name: "ci", domainIds: [domainId] },
    });

    expect(res.status).toBe(201);
    const stored = [...server.stores.db.apiKeys.values()].find((k) => k.name === "ci");
    await expect(res.json()).resolves.toEqual({
      id: stored?.id,
      name: "ci",
      key: expect.stringMatching(/^re_[A-Za-z0-9]{32}$/),
      keyPrefix: stored?.keyPrefix,
      isAdmin: false,
      createdAt: NOW.toISOString(),
      domainIds: [domainId],
    });
    await vi.waitFor(() => {
      expect(server.audit.entries).toHaveLength(1);
    });
    expect(server.audit.entries[0]).toMatchObject({
      action: "api_key.create",
      resourceType: "api_key",
      resourceId: stored?.id,
      statusCode: 201,
      details: { name: "ci", isAdmin: false, domainIds: [domainId] },
    });
  });

  it("rejects a scoped key without domains", async () => {
    const res = await server.request("/api-keys", { method: "POST", key: server.adminKey, json: { name: "ci" } });

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toMatchObject({
      error: {
        code: "invalid_request",
        message: "Non-admin keys must have at least one domain",
        fields: { domainIds: "At least one domain is required" },
      },
    });
  });

  it("lists keys without their hashes", async () => {
    const { key } = await server.ctx.apiKeys.create({ name: "ci", domainIds: [domainId] });
    const id = key.id;

    const res = await server.request(`/api-keys/${id}`, { key: server.adminKey });

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({
      id,
      name: "ci",
      keyPrefix: key.keyPrefix,
      isAdmin: false,
      state: "active",
      createdAt: NOW.toISOString(),
      revokedAt: null,
      lastUsedAt: null,
      lastUsedIp: null,
      domainIds: [domainId],
    });

    const list = await server.request("/api-keys?limit=1", { key: server.adminKey });
    await expect(list.json()).resolves.toMatchObject({ page: 1, limit: 1, total: 2 });
  });

  it("revokes a key so it stops authenticating", async () => {
    const { rawKey, key } = await server.ctx.apiKeys.create({ name: "temp", domainIds: [domainId] });
    expect((await server.request("/domains", { key: rawKey })).status).toBe(200);

    const res = await server.request(`/api-keys/${key.id}`, { method: "DELETE", key: server.adminKey });

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toMatchObject({
      id: key.id,
      state: "revoked",
      revokedAt: NOW.toISOString(),
      lastUsedAt: NOW.toISOString(),
    });
    expect((await server.request("/domains", { key: rawKey })).status).toBe(401);
  });

  it("answers not found for an unknown key", async () => {
    const res = await server.request("/api-keys/missing", { method: "DELETE", key: server.adminKey });

    expect(res.status).toBe(404);
    await expect(res.json()).resolves.toMatchObject({ error: { message: "API key not found" } });
  });

  it("lists archived keys", async () => {
    const { key } = await server.ctx.apiKeys.create({ name: "old", domainIds: [domainId] });
    await server.ctx.apiKeys.revoke(key.id);
    const archivedAt = new Date(NOW.getTime() + 91 * DAY);
    await archiveRevokedKeys({
      store: server.stores.apiKeys,
      retentionDays: 90,
      logger: createLogger({ level: "silent" }),
      now: () => archivedAt,
    });

    const res = await server.request("/api-keys/revoked", { key: server.adminKey });

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toMatchObject({
      page: 1,
      limit: 20,
      total: 1,
      data: [
        {
          id: key.id,
          name: "old",
          state: "archived",
          revokedAt: NOW.toISOString(),
          archivedAt: archivedAt.toISOString(),
          domainIds: [domainId],
        },
      ],
    });
  });
});
