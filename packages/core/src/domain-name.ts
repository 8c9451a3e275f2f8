import { z } from "zod";
import { ValidationError } from "@relaymail/errors";

const LABEL = "[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?";
const HOSTNAME_PATTERN = new RegExp(`^(?:${LABEL}\\.)+${LABEL}$`);

export const domainNameSchema = z
  .string({ required_error: "Domain name is required" })
  .trim()
  .toLowerCase()
  .min(1, "Domain name is required")
  .max(253, "Domain name is too long")
  .regex(HOSTNAME_PATTERN, "Invalid domain name");

/**
 * Trimmed, lower-cased, syntactically valid domain name.
 *
 * @throws ValidationError naming the `name` field
 */
export function normalizeDomainName(input: unknown): string {
  const parsed = domainNameSchema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? "Invalid domain name";
    throw new ValidationError(message, { name: message });
  }
  return parsed.data;
}

export function isValidDomainName(input: string): boolean {
  return domainNameSchema.safeParse(input).success;
}
