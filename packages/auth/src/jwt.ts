import jwt from "jsonwebtoken";
import type { SessionPayload } from "@relaymail/types";

export interface SessionConfig {
  secret: string;
  expiryDays: number;
}

const ALGORITHM = "HS256";
const ADMIN_SUBJECT = "admin";

export function sessionMaxAgeMs(config: SessionConfig): number {
  return config.expiryDays * 24 * 60 * 60 * 1000;
}

/**
 * Sign the admin session token stored in the session cookie.
 */
export function issueSessionToken(config: SessionConfig): string {
  return jwt.sign({ actorType: "admin" }, config.secret, {
    algorithm: ALGORITHM,
    subject: ADMIN_SUBJECT,
    expiresIn: config.expiryDays * 24 * 60 * 60,
  });
}

/**
 * Verify a session token. Anything other than a well-formed, unexpired admin
 * claim signed with `secret` yields null.
 */
export function verifySessionToken(token: string, secret: string): SessionPayload | null {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: [ALGORITHM] });
  } catch {
    return null;
  }

  if (typeof decoded === "string") return null;

  const { sub, iat, exp } = decoded;
  const actorType: unknown = decoded["actorType"];
  if (
    sub !== ADMIN_SUBJECT ||
    actorType !== "admin" ||
    typeof iat !== "number" ||
    typeof exp !== "number"
  ) {
    return null;
  }

  return { sub, actorType, iat, exp };
}
