import { z } from "zod";
import type { DnsRecord } from "@relaymail/types";

const dnsRecordSchema = z.object({
  type: z.enum(["CNAME", "TXT", "MX"]),
  name: z.string(),
  value: z.string(),
  priority: z.number().int().nonnegative(),
  verified: z.boolean(),
});

const dnsRecordListSchema = z.array(dnsRecordSchema);

/**
 * Stored form of a domain's record set. Field order is fixed so equal sets
 * serialize to equal strings.
 */
export function serializeDnsRecords(records: readonly DnsRecord[]): string {
  return JSON.stringify(
    records.map((r) => ({
      type: r.type,
      name: r.name,
      value: r.value,
      priority: r.priority,
      verified: r.verified,
    })),
  );
}

export function parseDnsRecords(serialized: string | null): DnsRecord[] | null {
  if (serialized === null) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(serialized);
  } catch (err) {
    throw new Error("Stored DNS records are not valid JSON", { cause: err });
  }

  const parsed = dnsRecordListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Stored DNS records are malformed: ${parsed.error.message}`);
  }
  return parsed.data;
}
