import { Router } from "express";
import type { Request, RequestHandler, Response } from "express";
import { z } from "zod";
import { verifyPassword } from "@relaymail/crypto";
import { UnauthorizedError } from "@relaymail/errors";
import {
  FixedWindowLimiter,
  SESSION_COOKIE,
  createRateLimitMiddleware,
  getAuth,
  issueSessionToken,
  sessionMaxAgeMs,
} from "@relaymail/auth";
import type { RateLimitStore } from "@relaymail/auth";
import { parseInput } from "@relaymail/core";
import type { ApiContext } from "../context.js";
import { audited, setAuditError } from "../middleware/audit.js";
import { asyncHandler } from "../http.js";

const loginSchema = z.object({ password: z.string().min(1, "Password is required") });

const ADMIN_INFO = { name: "admin", isAuthenticated: true } as const;

/**
 * Login is public behind its own limiter; logout and me run behind the
 * `authenticate` chain.
 */
export function adminRoutes(
  ctx: ApiContext,
  store: RateLimitStore,
  authenticate: RequestHandler[],
): Router {
  const router = Router();
  const session = { secret: ctx.config.auth.sessionSecret, expiryDays: ctx.config.auth.sessionExpiryDays };
  const cookieOptions = {
    httpOnly: true,
    sameSite: "strict" as const,
    secure: ctx.config.nodeEnv === "production",
    path: "/",
  };

  const loginLimiter = new FixedWindowLimiter({
    name: "login",
    limit: ctx.config.rateLimit.loginPerMinute,
    windowMs: 60_000,
    store,
    ...(ctx.now ? { now: ctx.now } : {}),
  });

  router.post(
    "/admin/login",
    createRateLimitMiddleware(loginLimiter),
    audited(ctx.audit, "admin.login", "session"),
    asyncHandler(async (req, res) => {
      const { password } = parseInput(loginSchema, req.body, "Invalid login request");

      if (!(await verifyPassword(password, ctx.config.auth.adminPasswordHash))) {
        setAuditError(res, "Invalid password");
        throw new UnauthorizedError("Invalid password");
      }

      res.cookie(SESSION_COOKIE, issueSessionToken(session), {
        ...cookieOptions,
        maxAge: sessionMaxAgeMs(session),
      });
      res.json(ADMIN_INFO);
    }),
  );

  router.post(
    "/admin/logout",
    authenticate,
    audited(ctx.audit, "admin.logout", "session"),
    (_req: Request, res: Response) => {
      res.clearCookie(SESSION_COOKIE, cookieOptions);
      res.status(204).end();
    },
  );

  router.get("/admin/me", authenticate, (req: Request, res: Response) => {
    if (getAuth(req).actorType !== "admin") {
      throw new UnauthorizedError("No admin session");
    }
    res.json(ADMIN_INFO);
  });

  return router;
}
