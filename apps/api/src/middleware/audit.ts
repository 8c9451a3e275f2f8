import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { AuditAction, AuditEntry } from "@relaymail/types";
import type { AuditSink } from "@relaymail/core";

interface AuditNotes {
  resourceId?: string;
  details?: Record<string, unknown>;
  errorMessage?: string;
}

const notes = new WeakMap<Response, AuditNotes>();

function note(res: Response, patch: AuditNotes): void {
  notes.set(res, { ...notes.get(res), ...patch });
}

/** Name the resource a handler created or acted on, plus any details. */
export function setAuditResource(res: Response, resourceId: string, details?: Record<string, unknown>): void {
  note(res, details ? { resourceId, details } : { resourceId });
}

export function setAuditDetails(res: Response, details: Record<string, unknown>): void {
  note(res, { details });
}

export function setAuditError(res: Response, errorMessage: string): void {
  note(res, { errorMessage });
}

/**
 * Record one audit entry per request once the response is sent, whether the
 * handler succeeded or failed.
 */
export function audited(
  sink: AuditSink,
  action: AuditAction,
  resourceType: AuditEntry["resourceType"],
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Express restores the parent's params once an error leaves the router
    const routeId = req.params["id"] ?? null;
    res.on("finish", () => {
      const recorded = notes.get(res) ?? {};
      const entry: AuditEntry = {
        action,
        actorType: req.auth?.actorType ?? "admin",
        actorId: req.auth?.actorId ?? null,
        resourceType,
        resourceId: recorded.resourceId ?? routeId,
        statusCode: res.statusCode,
        ipAddress: req.ip ?? null,
        userAgent: req.get("user-agent") ?? null,
      };
      if (recorded.errorMessage !== undefined) entry.errorMessage = recorded.errorMessage;
      if (recorded.details !== undefined) entry.details = recorded.details;
      sink.record(entry);
    });
    next();
  };
}
