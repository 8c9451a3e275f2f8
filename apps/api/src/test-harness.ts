import { once } from "node:events";
import type { Server } from "node:http";
import { LogBuffer, createLogger } from "@relaymail/logger";
import { hashPassword } from "@relaymail/crypto";
import { ApiKeyValidator } from "@relaymail/auth";
import {
  ApiKeyService,
  DomainService,
  DomainVerificationService,
  EmailService,
} from "@relaymail/core";
import {
  RecordingAuditSink,
  RecordingDispatcher,
  RecordingPublisher,
  RecordingSender,
  ScriptedIdentityProvider,
  StaticDnsResolver,
  createInMemoryStores,
} from "@relaymail/core/testing";
import type { InMemoryStores } from "@relaymail/core/testing";
import type { ApiContext } from "./context.js";
import { createApp } from "./app.js";

export const NOW = new Date("2026-03-01T12:00:00.000Z");
export const ADMIN_PASSWORD = "test-password";
export const USER_AGENT = "relaymail-tests";
export const SESSION_SECRET = "test-secret-test-secret-test-secret";

let passwordHash: Promise<string> | undefined;

export interface TestServer {
  baseUrl: string;
  ctx: ApiContext;
  stores: InMemoryStores;
  identity: ScriptedIdentityProvider;
  sender: RecordingSender;
  dispatcher: RecordingDispatcher;
  audit: RecordingAuditSink;
  databaseError: { current: Error | null };
  /** Raw admin API key. */
  adminKey: string;
  request(path: string, init?: RequestInit & { key?: string; json?: unknown }): Promise<Response>;
  /** Insert a domain straight into the store, optionally already verified. */
  addDomain(name: string, status?: "pending" | "verifying" | "verified"): Promise<string>;
  /** Raw key limited to `domainIds`. */
  scopedKey(domainIds: string[]): Promise<string>;
  close(): Promise<void>;
}

export interface TestServerOptions {
  loginPerMinute?: number;
  apiPerMinute?: number;
  now?: () => number;
}

/**
 * The full HTTP app over in-memory stores and scripted providers, listening
 * on an ephemeral port.
 */
export async function startTestServer(options: TestServerOptions = {}): Promise<TestServer> {
  passwordHash ??= hashPassword(ADMIN_PASSWORD, 1_000);
  const logger = createLogger({ level: "silent" });
  const stores = createInMemoryStores();
  const identity = new ScriptedIdentityProvider();
  const publisher = new RecordingPublisher();
  const resolver = new StaticDnsResolver();
  const sender = new RecordingSender();
  const dispatcher = new RecordingDispatcher();
  const audit = new RecordingAuditSink();
  const databaseError: { current: Error | null } = { current: null };
  const now = () => NOW;

  const apiKeys = new ApiKeyService({ keys: stores.apiKeys, domains: stores.domains, logger, now });
  const ctx: ApiContext = {
    config: {
      nodeEnv: "test",
      auth: { sessionSecret: SESSION_SECRET, sessionExpiryDays: 30, adminPasswordHash: await passwordHash },
      cors: { origins: ["http://localhost:5173"] },
      rateLimit: { loginPerMinute: options.loginPerMinute ?? 100, apiPerMinute: options.apiPerMinute ?? 1_000 },
    },
    version: "1.2.3",
    logger,
    logs: new LogBuffer(),
    validator: new ApiKeyValidator(stores.apiKeys, logger, now),
    domains: new DomainService({ domains: stores.domains, identity, publisher, dispatcher, logger, now }),
    verification: new DomainVerificationService({
      domains: stores.domains,
      identity,
      publisher,
      resolver,
      audit,
      logger,
      timeoutHours: 72,
      pollIntervalMinutes: 5,
      now,
    }),
    emails: new EmailService({ domains: stores.domains, sentEmails: stores.sentEmails, sender, logger, now }),
    apiKeys,
    auditLog: stores.audit,
    audit,
    sender,
    pingDatabase: async () => {
      if (databaseError.current) throw databaseError.current;
    },
    ...(options.now ? { now: options.now } : {}),
  };

  const server: Server = createApp(ctx).listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server did not bind a TCP port");
  }
  const baseUrl = `http://127.0.0.1:${String(address.port)}`;

  const { rawKey: adminKey } = await apiKeys.create({ name: "ops", isAdmin: true });

  return {
    baseUrl,
    ctx,
    stores,
    identity,
    sender,
    dispatcher,
    audit,
    databaseError,
    adminKey,
    request(path, init = {}) {
      const { key, json, headers, ...rest } = init;
      const merged = new Headers(headers);
      if (!merged.has("user-agent")) merged.set("user-agent", USER_AGENT);
      if (key !== undefined) merged.set("authorization", `Bearer ${key}`);
      if (json !== undefined) merged.set("content-type", "application/json");
      return fetch(`${baseUrl}${path}`, {
        ...rest,
        headers: merged,
        ...(json !== undefined ? { body: JSON.stringify(json) } : {}),
      });
    },
    async addDomain(name, status = "verified") {
      const id = `dom-${name}`;
      await stores.domains.insert({ id, name, createdAt: new Date(NOW.getTime() - 3_600_000) });
      if (status !== "pending") {
        await stores.domains.update(id, {
          status,
          verificationStartedAt: new Date(NOW.getTime() - 3_600_000),
          ...(status === "verified" ? { verifiedAt: NOW } : {}),
        });
      }
      return id;
    },
    async scopedKey(domainIds) {
      const { rawKey } = await apiKeys.create({ name: "scoped", domainIds });
      return rawKey;
    },
    async close() {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
