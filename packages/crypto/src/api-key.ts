import crypto from "node:crypto";

const BASE62 = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
const RANDOM_LENGTH = 32;
const SALT_BYTES = 16;

export const API_KEY_PREFIX = "re_";
export const ADMIN_API_KEY_PREFIX = "re_admin_";
export const KEY_PREFIX_LENGTH = 11;

export interface GeneratedApiKey {
  /** Shown to the caller once, never stored. */
  key: string;
  /** First {@link KEY_PREFIX_LENGTH} characters, stored for lookup and display. */
  prefix: string;
}

function randomBase62(length: number): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += BASE62.charAt(crypto.randomInt(BASE62.length));
  }
  return out;
}

export function generateApiKey(options?: { admin?: boolean }): GeneratedApiKey {
  const scheme = options?.admin ? ADMIN_API_KEY_PREFIX : API_KEY_PREFIX;
  const key = `${scheme}${randomBase62(RANDOM_LENGTH)}`;
  return { key, prefix: keyPrefixOf(key) };
}

export function keyPrefixOf(key: string): string {
  return key.slice(0, KEY_PREFIX_LENGTH);
}

/**
 * Cheap shape check done before any store lookup.
 */
export function isWellFormedApiKey(key: string): boolean {
  return key.startsWith(API_KEY_PREFIX) && key.length >= KEY_PREFIX_LENGTH;
}

export function generateKeySalt(): string {
  return crypto.randomBytes(SALT_BYTES).toString("base64");
}

/**
 * SHA-256 over the raw key followed by its base64 salt, base64 encoded.
 */
export function hashApiKey(key: string, salt: string): string {
  return crypto.createHash("sha256").update(key + salt).digest("base64");
}

export function verifyApiKeyHash(key: string, salt: string, expectedHash: string): boolean {
  const computed = Buffer.from(hashApiKey(key, salt), "base64");
  const expected = Buffer.from(expectedHash, "base64");

  if (computed.length !== expected.length) {
    return false;
  }

  return crypto.timingSafeEqual(computed, expected);
}
