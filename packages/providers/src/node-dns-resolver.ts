import { Resolver } from "node:dns/promises";
import type { DnsRecordType } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import { errorMessage } from "@relaymail/errors";
import type { DnsCheckResult, IDnsResolver } from "./dns-resolver.interface.js";

/**
 * The subset of `dns.promises.Resolver` used here.
 */
export interface DnsLookup {
  getServers(): string[];
  resolveCname(name: string): Promise<string[]>;
  resolveTxt(name: string): Promise<string[][]>;
  resolveMx(name: string): Promise<{ exchange: string; priority: number }[]>;
}

export interface NodeDnsResolverConfig {
  logger: Logger;
  /** Per-query timeout. Default: 5000 */
  timeoutMs?: number;
  /** Queried when the system resolver has no matching answer. Default: ["8.8.8.8"] */
  fallbackServers?: string[];
  /** Overrides resolver construction; null servers means the system defaults. */
  createLookup?: (servers: string[] | null) => DnsLookup;
}

const NOT_FOUND_CODES = new Set(["ENODATA", "ENOTFOUND", "NXDOMAIN"]);

export function normalizeDnsValue(value: string): string {
  return value.trim().replace(/\.$/, "").toLowerCase();
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Direct DNS lookups through the system resolver, then a public one. Used to
 * tell operators which records are visible; it never decides verification.
 */
export class NodeDnsResolver implements IDnsResolver {
  private readonly lookups: { server: string; lookup: DnsLookup }[];
  private readonly logger: Logger;

  constructor(config: NodeDnsResolverConfig) {
    this.logger = config.logger;
    const timeout = config.timeoutMs ?? 5_000;
    const create =
      config.createLookup ??
      ((servers: string[] | null): DnsLookup => {
        const resolver = new Resolver({ timeout, tries: 1 });
        if (servers) resolver.setServers(servers);
        return resolver;
      });

    const system = create(null);
    const fallbackServers = config.fallbackServers ?? ["8.8.8.8"];
    this.lookups = [
      { server: system.getServers()[0] ?? "system", lookup: system },
      { server: fallbackServers.join(","), lookup: create(fallbackServers) },
    ];
  }

  async checkRecord(
    type: DnsRecordType,
    name: string,
    expectedValue: string,
  ): Promise<DnsCheckResult> {
    const expected = normalizeDnsValue(expectedValue);
    let seen: DnsCheckResult | undefined;

    for (const { server, lookup } of this.lookups) {
      let values: string[];
      try {
        values = await this.query(lookup, type, name);
      } catch (err) {
        const code = errorCode(err);
        if (!code || !NOT_FOUND_CODES.has(code)) {
          this.logger.warn({ name, type, server, error: errorMessage(err) }, "DNS query failed");
        }
        continue;
      }

      const match = values.find((v) => normalizeDnsValue(v) === expected);
      if (match !== undefined) {
        this.logger.debug({ name, type, server }, "DNS record visible");
        return { found: true, actualValue: match, verified: true, server };
      }

      const first = values[0];
      if (first !== undefined && !seen) {
        seen = { found: true, actualValue: first, verified: false, server };
      }
    }

    return seen ?? { found: false, actualValue: null, verified: false, server: null };
  }

  private async query(lookup: DnsLookup, type: DnsRecordType, name: string): Promise<string[]> {
    switch (type) {
      case "CNAME":
        return lookup.resolveCname(name);
      case "TXT": {
        const chunks = await lookup.resolveTxt(name);
        return chunks.map((parts) => parts.join(""));
      }
      case "MX": {
        const records = await lookup.resolveMx(name);
        return records.map((r) => r.exchange);
      }
    }
  }
}
