import { Router } from "express";
import type { Request, RequestHandler, Response } from "express";
import { getAuth } from "@relaymail/auth";

/**
 * `GET /tokens/me`: the effective permissions of whoever is calling, admin
 * session or API key. Admins get an empty allow-list; `isAdmin` covers them.
 */
export function tokenRoutes(authenticate: RequestHandler[]): Router {
  const router = Router();

  router.get("/tokens/me", authenticate, (req: Request, res: Response) => {
    const auth = getAuth(req);
    res.json({
      authenticated: true,
      actorType: auth.actorType,
      isAdmin: auth.isAdmin,
      keyId: auth.apiKeyId,
      keyPrefix: auth.actorType === "api_key" ? auth.actorId : null,
      allowedDomainIds: auth.allowedDomainIds === "all" ? [] : auth.allowedDomainIds,
    });
  });

  return router;
}
