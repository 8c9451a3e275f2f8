export type ActorType = "api_key" | "admin" | "system";

export interface ApiKey {
  id: string;
  name: string;
  keyHash: string;
  keySalt: string;
  keyPrefix: string;
  isAdmin: boolean;
  createdAt: Date;
  revokedAt: Date | null;
  lastUsedAt: Date | null;
  lastUsedIp: string | null;
  allowedDomainIds: string[];
}

export type ApiKeyState = "active" | "revoked" | "archived";

export interface ArchivedApiKey {
  id: string;
  name: string;
  keyPrefix: string;
  isAdmin: boolean;
  createdAt: Date;
  revokedAt: Date;
  archivedAt: Date;
  lastUsedAt: Date | null;
  lastUsedIp: string | null;
  allowedDomainIds: string[];
}

/**
 * The resolved caller of a request. `allowedDomainIds` is "all" for admin
 * keys and admin sessions.
 */
export interface AuthContext {
  actorType: Exclude<ActorType, "system">;
  /** Key prefix for API keys, null for admin sessions. */
  actorId: string | null;
  apiKeyId: string | null;
  isAdmin: boolean;
  allowedDomainIds: string[] | "all";
}

export interface SessionPayload {
  sub: string;
  actorType: "admin";
  iat: number;
  exp: number;
}
