import { Router } from "express";
import { z } from "zod";
import { errorMessage } from "@relaymail/errors";
import { parseInput } from "@relaymail/core";
import type { ApiContext } from "../context.js";
import { asyncHandler } from "../http.js";

const MAX_LOG_COUNT = 2_000;

const logQuerySchema = z.object({
  count: z.coerce
    .number()
    .int()
    .min(1)
    .default(1_000)
    .transform((n) => Math.min(n, MAX_LOG_COUNT)),
  level: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
});

export function systemRoutes(ctx: ApiContext): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  router.get(
    "/system/status",
    asyncHandler(async (_req, res) => {
      const issues: string[] = [];

      try {
        const provider = await ctx.sender.healthCheck();
        issues.push(...provider.issues);
        if (!provider.healthy && provider.issues.length === 0) {
          issues.push(`Email provider ${ctx.sender.name} is unhealthy`);
        }
      } catch (err) {
        issues.push(`Email provider check failed: ${errorMessage(err)}`);
      }

      try {
        await ctx.pingDatabase();
      } catch (err) {
        ctx.logger.warn({ error: errorMessage(err) }, "Database ping failed");
        issues.push("Database is unreachable");
      }

      res.json({ healthy: issues.length === 0, issues, timestamp: new Date().toISOString() });
    }),
  );

  router.get("/system/version", (_req, res) => {
    res.json({ version: ctx.version, environment: ctx.config.nodeEnv });
  });

  return router;
}

/**
 * Recent log lines for remote diagnostics. Admin only; the caller mounts this
 * behind `requireAdmin`.
 */
export function systemLogRoutes(ctx: ApiContext): Router {
  const router = Router();

  router.get("/", (req, res) => {
    const { count, level, category } = parseInput(logQuerySchema, req.query, "Invalid query parameters");
    const logs = ctx.logs.query({
      count,
      ...(level ? { level } : {}),
      ...(category ? { category } : {}),
    });
    res.json({ count: logs.length, logs });
  });

  return router;
}
