import { Router } from "express";
import type { ApiContext } from "../context.js";
import { audited, setAuditDetails, setAuditResource } from "../middleware/audit.js";
import { asyncHandler, paginated, parsePagination, routeParam } from "../http.js";
import { toApiKeyResponse, toArchivedApiKeyResponse } from "../serializers.js";

/** Admin only; the caller mounts this behind `requireAdmin`. */
export function apiKeyRoutes(ctx: ApiContext): Router {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const params = parsePagination(req.query);
      res.json(paginated(await ctx.apiKeys.list(params), params, toApiKeyResponse));
    }),
  );

  router.post(
    "/",
    audited(ctx.audit, "api_key.create", "api_key"),
    asyncHandler(async (req, res) => {
      const { key, rawKey } = await ctx.apiKeys.create(req.body);
      setAuditResource(res, key.id, {
        name: key.name,
        keyPrefix: key.keyPrefix,
        isAdmin: key.isAdmin,
        domainIds: key.allowedDomainIds,
      });
      // The only response that ever carries the raw key
      res.status(201).json({
        id: key.id,
        name: key.name,
        key: rawKey,
        keyPrefix: key.keyPrefix,
        isAdmin: key.isAdmin,
        createdAt: key.createdAt.toISOString(),
        domainIds: key.allowedDomainIds,
      });
    }),
  );

  router.get(
    "/revoked",
    asyncHandler(async (req, res) => {
      const params = parsePagination(req.query);
      res.json(paginated(await ctx.apiKeys.listArchived(params), params, toArchivedApiKeyResponse));
    }),
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      res.json(toApiKeyResponse(await ctx.apiKeys.get(routeParam(req, "id"))));
    }),
  );

  router.delete(
    "/:id",
    audited(ctx.audit, "api_key.revoke", "api_key"),
    asyncHandler(async (req, res) => {
      const key = await ctx.apiKeys.revoke(routeParam(req, "id"));
      setAuditDetails(res, { name: key.name, keyPrefix: key.keyPrefix });
      res.json(toApiKeyResponse(key));
    }),
  );

  return router;
}
