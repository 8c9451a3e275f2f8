import { Router } from "express";
import type { Request } from "express";
import { getAuth } from "@relaymail/auth";
import { ValidationError } from "@relaymail/errors";
import type { BatchValidationMode } from "@relaymail/core";
import type { ApiContext } from "../context.js";
import { audited, setAuditDetails, setAuditResource } from "../middleware/audit.js";
import { asyncHandler, routeParam } from "../http.js";
import { toSentEmailResponse } from "../serializers.js";

const BATCH_VALIDATION_HEADER = "x-batch-validation";

function batchMode(req: Request): BatchValidationMode {
  const value = req.get(BATCH_VALIDATION_HEADER)?.trim().toLowerCase();
  if (value === undefined || value === "" || value === "strict") return "strict";
  if (value === "permissive") return "permissive";
  throw new ValidationError(`${BATCH_VALIDATION_HEADER} must be "strict" or "permissive"`, {
    [BATCH_VALIDATION_HEADER]: "Expected strict or permissive",
  });
}

export function emailRoutes(ctx: ApiContext): Router {
  const router = Router();

  router.post(
    "/",
    audited(ctx.audit, "email.send", "email"),
    asyncHandler(async (req, res) => {
      const { id, domain } = await ctx.emails.send(req.body, getAuth(req));
      setAuditResource(res, id, { domain: domain.name });
      res.json({ id });
    }),
  );

  router.post(
    "/batch",
    audited(ctx.audit, "email.batch", "email"),
    asyncHandler(async (req, res) => {
      const mode = batchMode(req);
      const result = await ctx.emails.sendBatch(req.body, mode, getAuth(req));
      setAuditDetails(res, {
        mode,
        sent: result.data.length,
        rejected: result.errors?.length ?? 0,
      });
      res.json(result);
    }),
  );

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      res.json(await ctx.emails.list(req.query, getAuth(req)));
    }),
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const email = await ctx.emails.get(routeParam(req, "id"), getAuth(req));
      res.json(toSentEmailResponse(email));
    }),
  );

  return router;
}
