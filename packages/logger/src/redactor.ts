/**
 * Redaction rules for log output.
 *
 * Raw API keys, key hashes, session cookies and the admin password must never
 * reach a log line. Recipient addresses are masked rather than dropped so a
 * delivery can still be correlated.
 */

const EMAIL_REGEX = /([a-zA-Z0-9._%+-])[a-zA-Z0-9._%+-]*@([a-zA-Z0-9.-]+\.[a-zA-Z]{2,})/g;

/** Log fields that carry addresses. */
const ADDRESS_KEYS: ReadonlySet<string> = new Set(["to", "cc", "bcc", "from", "replyTo", "email"]);

/**
 * Mask the local part of every address in a string: `alice@example.com`
 * becomes `a***@example.com`.
 */
export function maskEmail(value: string): string {
  return value.replace(EMAIL_REGEX, "$1***@$2");
}

function maskAddressValue(value: unknown): unknown {
  if (typeof value === "string") return maskEmail(value);
  if (Array.isArray(value)) return value.map(maskAddressValue);
  return value;
}

/**
 * pino `formatters.log` hook: masks the address fields of a log object.
 * Other fields pass through untouched.
 */
export function maskAddresses(object: Record<string, unknown>): Record<string, unknown> {
  if (!Object.keys(object).some((key) => ADDRESS_KEYS.has(key))) {
    return object;
  }
  return Object.fromEntries(
    Object.entries(object).map(([key, value]) => [key, ADDRESS_KEYS.has(key) ? maskAddressValue(value) : value]),
  );
}

const TOP_LEVEL_PATHS = [
  "password",
  "secret",
  "token",
  "key",
  "apiKey",
  "rawKey",
  "keyHash",
  "keySalt",
  "authorization",
  "cookie",
  "secretAccessKey",
  "sessionSecret",
  "adminPasswordHash",
];

/**
 * Paths for pino's `redact` option: each sensitive name at the top level and
 * one level down, plus the request and response headers that carry credentials.
 */
export const REDACT_PATHS: string[] = [
  ...TOP_LEVEL_PATHS,
  ...TOP_LEVEL_PATHS.map((path) => `*.${path}`),
  "req.headers.authorization",
  "req.headers.cookie",
  'res.headers["set-cookie"]',
];
