import crypto from "node:crypto";

const DEFAULT_ITERATIONS = 210_000;
const KEY_LENGTH = 64;
const DIGEST = "sha512";
const DEFAULT_SALT_LENGTH = 16;
const SCHEME = "pbkdf2";

export function deriveKey(
  password: string,
  salt: Buffer,
  iterations: number = DEFAULT_ITERATIONS,
  keyLength: number = KEY_LENGTH,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    crypto.pbkdf2(password, salt, iterations, keyLength, DIGEST, (err, derivedKey) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(derivedKey);
    });
  });
}

export function generateSalt(length: number = DEFAULT_SALT_LENGTH): string {
  return crypto.randomBytes(length).toString("hex");
}

/**
 * Hash the admin password into the `pbkdf2$<iterations>$<saltHex>$<hashHex>`
 * form read from ADMIN_PASSWORD_HASH.
 */
export async function hashPassword(
  password: string,
  iterations: number = DEFAULT_ITERATIONS,
): Promise<string> {
  const salt = generateSalt();
  const hash = await deriveKey(password, Buffer.from(salt, "hex"), iterations);
  return `${SCHEME}$${String(iterations)}$${salt}$${hash.toString("hex")}`;
}

/**
 * Constant-time check of a password against a stored hash. A malformed
 * stored value never matches.
 */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const parts = stored.split("$");
  if (parts.length !== 4 || parts[0] !== SCHEME) {
    return false;
  }

  const [, iterationsPart = "", saltHex = "", hashHex = ""] = parts;
  const iterations = Number(iterationsPart);
  if (!Number.isInteger(iterations) || iterations <= 0 || saltHex === "" || hashHex === "") {
    return false;
  }

  const expected = Buffer.from(hashHex, "hex");
  if (expected.length === 0) {
    return false;
  }

  const actual = await deriveKey(password, Buffer.from(saltHex, "hex"), iterations, expected.length);
  return crypto.timingSafeEqual(actual, expected);
}
