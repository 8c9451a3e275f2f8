import { Router } from "express";
import { getAuth } from "@relaymail/auth";
import type { ApiContext } from "../context.js";
import { audited, setAuditDetails, setAuditResource } from "../middleware/audit.js";
import { asyncHandler, bodyField, paginated, parsePagination, routeParam } from "../http.js";
import { toDomainResponse } from "../serializers.js";

export function domainRoutes(ctx: ApiContext): Router {
  const router = Router();

  router.post(
    "/",
    audited(ctx.audit, "domain.create", "domain"),
    asyncHandler(async (req, res) => {
      const name = bodyField(req.body, "name");
      if (typeof name === "string") setAuditDetails(res, { name });

      const domain = await ctx.domains.create(name, getAuth(req));

      setAuditResource(res, domain.id, { name: domain.name });
      res.status(201).json(toDomainResponse(domain));
    }),
  );

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const params = parsePagination(req.query);
      const page = await ctx.domains.list(params, getAuth(req));
      res.json(paginated(page, params, (domain) => toDomainResponse(domain)));
    }),
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const domain = await ctx.domains.get(routeParam(req, "id"), getAuth(req));
      res.json(toDomainResponse(domain, ctx.verification.nextCheckAt(domain)));
    }),
  );

  router.delete(
    "/:id",
    audited(ctx.audit, "domain.delete", "domain"),
    asyncHandler(async (req, res) => {
      const domain = await ctx.domains.delete(routeParam(req, "id"), getAuth(req));
      setAuditDetails(res, { name: domain.name });
      res.status(204).end();
    }),
  );

  router.post(
    "/:id/verify",
    audited(ctx.audit, "domain.verify", "domain"),
    asyncHandler(async (req, res) => {
      const existing = await ctx.domains.get(routeParam(req, "id"), getAuth(req));
      const domain = await ctx.verification.checkNow(existing.id);
      setAuditDetails(res, { name: domain.name, status: domain.status });
      res.json(toDomainResponse(domain, ctx.verification.nextCheckAt(domain)));
    }),
  );

  router.get(
    "/:id/verification",
    asyncHandler(async (req, res) => {
      const domain = await ctx.domains.get(routeParam(req, "id"), getAuth(req));
      res.json(await ctx.verification.diagnostics(domain));
    }),
  );

  router.post(
    "/:id/test-email",
    audited(ctx.audit, "domain.test_email", "domain"),
    asyncHandler(async (req, res) => {
      const { id, domain } = await ctx.emails.sendTestEmail(routeParam(req, "id"), req.body, getAuth(req));
      setAuditDetails(res, { name: domain.name, emailId: id });
      res.json({ id });
    }),
  );

  return router;
}
