import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { AuthContext } from "@relaymail/types";
import { RateLimitedError, UnauthorizedError } from "@relaymail/errors";
import type { ApiKeyValidator } from "./api-key-validator.js";
import { verifySessionToken } from "./jwt.js";
import { assertAdmin } from "./rbac.js";
import type { RateLimiter } from "./rate-limit.js";

// Extend Express Request with auth context and requestId
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      auth?: AuthContext;
      requestId?: string;
    }
  }
}

export const SESSION_COOKIE = "relaymail_session";

const BEARER_PREFIX = "Bearer ";

const ADMIN_SESSION: AuthContext = {
  actorType: "admin",
  actorId: null,
  apiKeyId: null,
  isAdmin: true,
  allowedDomainIds: "all",
};

export interface AuthMiddlewareOptions {
  validator: ApiKeyValidator;
  sessionSecret: string;
}

function sessionCookie(req: Request): string | undefined {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== "object" || cookies === null || !(SESSION_COOKIE in cookies)) {
    return undefined;
  }
  const value: unknown = Reflect.get(cookies, SESSION_COOKIE);
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Resolve the caller from `Authorization: Bearer <key>` or, failing that,
 * the admin session cookie. A bearer header that is present but invalid is
 * rejected without falling back to the cookie.
 */
export function createAuthMiddleware({
  validator,
  sessionSecret,
}: AuthMiddlewareOptions): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const authHeader = req.headers.authorization;
      if (authHeader !== undefined) {
        if (!authHeader.startsWith(BEARER_PREFIX)) {
          throw new UnauthorizedError();
        }
        const context = await validator.validate(
          authHeader.slice(BEARER_PREFIX.length).trim(),
          req.ip ?? null,
        );
        if (!context) {
          throw new UnauthorizedError();
        }
        req.auth = context;
        next();
        return;
      }

      const token = sessionCookie(req);
      if (token && verifySessionToken(token, sessionSecret)) {
        req.auth = ADMIN_SESSION;
        next();
        return;
      }

      throw new UnauthorizedError("Missing authentication");
    } catch (err) {
      next(err);
    }
  };
}

/**
 * The auth context a handler runs under. Only valid behind the auth middleware.
 */
export function getAuth(req: Request): AuthContext {
  if (!req.auth) {
    throw new UnauthorizedError("Not authenticated");
  }
  return req.auth;
}

export function requireAdmin(req: Request, _res: Response, next: NextFunction): void {
  try {
    assertAdmin(getAuth(req));
    next();
  } catch (err) {
    next(err);
  }
}

/**
 * Apply a limiter per client IP, setting the standard RateLimit headers and
 * `Retry-After` on rejection.
 */
export function createRateLimitMiddleware(
  limiter: RateLimiter,
  keyOf: (req: Request) => string = (req) => req.ip ?? "unknown",
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const decision = await limiter.consume(keyOf(req));
      res.setHeader("RateLimit-Limit", String(decision.limit));
      res.setHeader("RateLimit-Remaining", String(decision.remaining));

      if (!decision.allowed) {
        res.setHeader("Retry-After", String(decision.retryAfterSeconds));
        throw new RateLimitedError(
          `Too many requests, retry after ${String(decision.retryAfterSeconds)} seconds`,
          decision.retryAfterSeconds,
        );
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}
