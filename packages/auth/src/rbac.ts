import type { AuthContext } from "@relaymail/types";
import { ForbiddenError } from "@relaymail/errors";

/**
 * Admin actors reach every domain; scoped keys only their allow-list.
 */
export function canAccessDomain(context: AuthContext, domainId: string): boolean {
  if (context.isAdmin || context.allowedDomainIds === "all") {
    return true;
  }
  return context.allowedDomainIds.includes(domainId);
}

/**
 * Throws `forbidden` for an out-of-scope domain. Existing and missing
 * domains outside the scope are reported the same way by callers that check
 * scope before existence.
 */
export function assertDomainAccess(context: AuthContext, domainId: string): void {
  if (!canAccessDomain(context, domainId)) {
    throw new ForbiddenError("API key does not have access to this domain");
  }
}

export function assertAdmin(context: AuthContext): void {
  if (!context.isAdmin) {
    throw new ForbiddenError("Admin access required");
  }
}

/**
 * Domain ids a list query may return for this actor.
 */
export function domainScope(context: AuthContext): string[] | "all" {
  return context.isAdmin ? "all" : context.allowedDomainIds;
}
