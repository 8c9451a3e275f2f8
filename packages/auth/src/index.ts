export { ApiKeyValidator, toAuthContext } from "./api-key-validator.js";
export type { ApiKeyLookup } from "./api-key-validator.js";
export {
  issueSessionToken,
  verifySessionToken,
  sessionMaxAgeMs,
  type SessionConfig,
} from "./jwt.js";
export { canAccessDomain, assertDomainAccess, assertAdmin, domainScope } from "./rbac.js";
export {
  LruRateLimitStore,
  FixedWindowLimiter,
  SlidingWindowLimiter,
  type RateLimitStore,
  type RateLimiter,
  type RateLimitDecision,
  type WindowOptions,
  type SlidingWindowOptions,
} from "./rate-limit.js";
export {
  SESSION_COOKIE,
  createAuthMiddleware,
  createRateLimitMiddleware,
  getAuth,
  requireAdmin,
  type AuthMiddlewareOptions,
} from "./middleware.js";
