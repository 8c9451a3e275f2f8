import { Router } from "express";
import { z } from "zod";
import type { AuditQuery } from "@relaymail/types";
import { parseInput } from "@relaymail/core";
import type { ApiContext } from "../context.js";
import { asyncHandler, paginated, paginationSchema } from "../http.js";
import { toAuditLogResponse } from "../serializers.js";

const auditQuerySchema = paginationSchema
  .extend({
    action: z.string().min(1).optional(),
    actorId: z.string().min(1).optional(),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
  })
  .refine((q) => !q.from || !q.to || q.from.getTime() <= q.to.getTime(), {
    message: "from must not be after to",
    path: ["from"],
  });

/** Admin only; the caller mounts this behind `requireAdmin`. */
export function auditRoutes(ctx: ApiContext): Router {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const parsed = parseInput(auditQuerySchema, req.query, "Invalid query parameters");
      const query: AuditQuery = { page: parsed.page, limit: parsed.limit };
      if (parsed.action) query.action = parsed.action;
      if (parsed.actorId) query.actorId = parsed.actorId;
      if (parsed.from) query.from = parsed.from;
      if (parsed.to) query.to = parsed.to;

      res.json(paginated(await ctx.auditLog.list(query), query, toAuditLogResponse));
    }),
  );

  return router;
}
