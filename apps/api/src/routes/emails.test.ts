import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { NOW, startTestServer } from "../test-harness.js";
import type { TestServer } from "../test-harness.js";

const message = (overrides: Record<string, unknown> = {}) => ({
  from: "Support <support@example.com>",
  to: "user@example.org",
  subject: "Welcome",
  text: "Hello there",
  ...overrides,
});

describe("email routes", () => {
  let server: TestServer;
  let domainId: string;
  let key: string;

  beforeEach(async () => {
    server = await startTestServer();
    domainId = await server.addDomain("example.com");
    key = await server.scopedKey([domainId]);
  });

  afterEach(async () => {
    await server.close();
  });

  describe("POST /emails", () => {
    it("sends and returns the stored id", async () => {
      const res = await server.request("/emails", {
        method: "POST",
        key,
        json: message({ bcc: ["audit@example.org"] }),
      });

      expect(res.status).toBe(200);
      const stored = [...server.stores.db.sentEmails.values()];
      expect(stored).toHaveLength(1);
      await expect(res.json()).resolves.toEqual({ id: stored[0]?.id });
      expect(server.sender.sent).toEqual([
        {
          from: "Support <support@example.com>",
          to: ["user@example.org"],
          subject: "Welcome",
          text: "Hello there",
          bcc: ["audit@example.org"],
        },
      ]);

      await vi.waitFor(() => {
        expect(server.audit.entries).toHaveLength(1);
      });
      expect(server.audit.entries[0]).toMatchObject({
        action: "email.send",
        resourceType: "email",
        resourceId: stored[0]?.id,
        statusCode: 200,
        details: { domain: "example.com" },
      });
    });

    it("refuses a domain that is not verified", async () => {
      const pending = await server.addDomain("pending.example.com", "pending");
      const pendingKey = await server.scopedKey([pending]);

      const res = await server.request("/emails", {
        method: "POST",
        key: pendingKey,
        json: message({ from: "hello@pending.example.com" }),
      });

      expect(res.status).toBe(409);
      await expect(res.json()).resolves.toMatchObject({
        error: {
          code: "domain_not_verified",
          message: "Domain is not verified for sending: pending.example.com",
        },
      });
      expect(server.sender.sent).toEqual([]);
    });

    it("forbids sending from a domain outside the key's scope", async () => {
      await server.addDomain("other.example.com");

      const res = await server.request("/emails", {
        method: "POST",
        key,
        json: message({ from: "hello@other.example.com" }),
      });

      expect(res.status).toBe(403);
      expect(server.sender.sent).toEqual([]);
    });

    it("reports each missing field", async () => {
      const res = await server.request("/emails", {
        method: "POST",
        key,
        json: { from: "a@example.com", to: [], subject: "" },
      });

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toMatchObject({
        error: {
          code: "invalid_request",
          fields: { to: "to must contain at least one address", subject: "subject is required" },
        },
      });
    });
  });

  describe("POST /emails/batch", () => {
    it("sends nothing when any message is invalid in strict mode", async () => {
      const res = await server.request("/emails/batch", {
        method: "POST",
        key,
        json: [message(), message({ to: "not-an-address" })],
      });

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toMatchObject({
        error: { code: "invalid_recipient_email", message: "Invalid recipient email: not-an-address" },
      });
      expect(server.sender.sent).toEqual([]);
    });

    it("sends the valid messages and reports the rest in permissive mode", async () => {
      const res = await server.request("/emails/batch", {
        method: "POST",
        key,
        headers: { "x-batch-validation": "permissive" },
        json: [message(), message({ to: "not-an-address" }), message({ subject: "Second" })],
      });

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({
        data: [{ id: expect.any(String) }, { id: expect.any(String) }],
        errors: [{ index: 1, message: "Invalid recipient email: not-an-address" }],
      });
      expect(server.sender.sent.map((m) => m.subject)).toEqual(["Welcome", "Second"]);
      await vi.waitFor(() => {
        expect(server.audit.entries).toHaveLength(1);
      });
      expect(server.audit.entries[0]).toMatchObject({
        action: "email.batch",
        details: { mode: "permissive", sent: 2, rejected: 1 },
      });
    });

    it("rejects an unknown validation mode", async () => {
      const res = await server.request("/emails/batch", {
        method: "POST",
        key,
        headers: { "x-batch-validation": "lenient" },
        json: [message()],
      });

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toMatchObject({
        error: {
          code: "invalid_request",
          message: 'x-batch-validation must be "strict" or "permissive"',
          fields: { "x-batch-validation": "Expected strict or permissive" },
        },
      });
    });
  });

  describe("GET /emails/:id", () => {
    it("returns the email without bcc recipients", async () => {
      await server.request("/emails", {
        method: "POST",
        key,
        json: message({ cc: "cc@example.org", bcc: "hidden@example.org", html: "<p>Hello</p>" }),
      });
      const [id = ""] = server.stores.db.sentEmails.keys();

      const res = await server.request(`/emails/${id}`, { key });

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({
        object: "email",
        id,
        message_id: "provider-msg-1",
        from: "Support <support@example.com>",
        to: ["user@example.org"],
        cc: ["cc@example.org"],
        reply_to: null,
        subject: "Welcome",
        html: "<p>Hello</p>",
        text: "Hello there",
        created_at: NOW.toISOString(),
        last_event: "sent",
        domain_id: domainId,
        api_key_id: expect.any(String),
      });
    });

    it("forbids reading another domain's email", async () => {
      const other = await server.addDomain("other.example.com");
      const sent = await server.request("/emails", {
        method: "POST",
        key: server.adminKey,
        json: message({ from: "hi@other.example.com" }),
      });
      expect(sent.status).toBe(200);
      const [id = ""] = server.stores.db.sentEmails.keys();
      expect(server.stores.db.sentEmails.get(id)?.domainId).toBe(other);

      const res = await server.request(`/emails/${id}`, { key });

      expect(res.status).toBe(403);
    });
  });

  it("lists sent emails as a cursor page", async () => {
    await server.request("/emails", { method: "POST", key, json: message() });

    const res = await server.request("/emails?limit=10", { key });

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toMatchObject({
      object: "list",
      has_more: false,
      next_cursor: null,
      data: [{ fromAddress: "Support <support@example.com>", sentAt: NOW.toISOString(), domainId }],
    });
  });
});
