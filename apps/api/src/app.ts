import express from "express";
import type { Express, RequestHandler } from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import {
  LruRateLimitStore,
  SlidingWindowLimiter,
  createAuthMiddleware,
  createRateLimitMiddleware,
  requireAdmin,
} from "@relaymail/auth";
import type { ApiContext } from "./context.js";
import { requestContext } from "./middleware/request-context.js";
import { errorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { systemLogRoutes, systemRoutes } from "./routes/system.js";
import { tokenRoutes } from "./routes/tokens.js";
import { adminRoutes } from "./routes/admin.js";
import { domainRoutes } from "./routes/domains.js";
import { emailRoutes } from "./routes/emails.js";
import { apiKeyRoutes } from "./routes/api-keys.js";
import { auditRoutes } from "./routes/audit.js";

/** Batches of up to 100 HTML emails. */
const JSON_BODY_LIMIT = "10mb";

export function createApp(ctx: ApiContext): Express {
  const app = express();
  const store = ctx.rateLimitStore ?? new LruRateLimitStore();

  app.disable("x-powered-by");
  app.use(requestContext(ctx.logger));
  app.use(cors({ origin: ctx.config.cors.origins, credentials: true }));
  app.use(cookieParser());
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  const apiLimiter = new SlidingWindowLimiter({
    name: "api",
    limit: ctx.config.rateLimit.apiPerMinute,
    windowMs: 60_000,
    segments: 6,
    store,
    ...(ctx.now ? { now: ctx.now } : {}),
  });
  const authenticate: RequestHandler[] = [
    createRateLimitMiddleware(apiLimiter),
    createAuthMiddleware({ validator: ctx.validator, sessionSecret: ctx.config.auth.sessionSecret }),
  ];

  app.use(systemRoutes(ctx));
  app.use(adminRoutes(ctx, store, authenticate));
  app.use(tokenRoutes(authenticate));
  app.use("/system/logs", authenticate, requireAdmin, systemLogRoutes(ctx));
  app.use("/domains", authenticate, domainRoutes(ctx));
  app.use("/emails", authenticate, emailRoutes(ctx));
  app.use("/api-keys", authenticate, requireAdmin, apiKeyRoutes(ctx));
  app.use("/audit", authenticate, requireAdmin, auditRoutes(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler(ctx.logger));

  return app;
}
