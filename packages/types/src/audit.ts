import type { ActorType } from "./auth.js";

export type AuditAction =
  | "domain.create"
  | "domain.delete"
  | "domain.verify"
  | "domain.test_email"
  | "domain.setup"
  | "domain.verified"
  | "domain.failed"
  | "email.send"
  | "email.batch"
  | "api_key.create"
  | "api_key.revoke"
  | "admin.login"
  | "admin.logout";

export interface AuditEntry {
  action: AuditAction;
  actorType: ActorType;
  actorId: string | null;
  resourceType: "domain" | "email" | "api_key" | "session";
  resourceId: string | null;
  statusCode: number;
  errorMessage?: string;
  details?: Record<string, unknown>;
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AuditLog extends Required<Omit<AuditEntry, "errorMessage" | "details">> {
  id: string;
  timestamp: Date;
  errorMessage: string | null;
  details: Record<string, unknown> | null;
}

export interface AuditQuery {
  page: number;
  limit: number;
  action?: string;
  actorId?: string;
  from?: Date;
  to?: Date;
}
