import type { NextFunction, Request, Response } from "express";
import { AppError, NotFoundError, RateLimitedError, ValidationError } from "@relaymail/errors";
import type { Logger } from "@relaymail/logger";
import { setAuditError } from "./audit.js";

/** body-parser marks its failures with a `type` and an HTTP `status`. */
function bodyParserFailure(err: unknown): { type: string; status: number } | null {
  if (!(err instanceof Error)) return null;
  const type: unknown = Reflect.get(err, "type");
  const status: unknown = Reflect.get(err, "status");
  if (typeof type !== "string" || typeof status !== "number") return null;
  return { type, status };
}

function toAppError(err: unknown): AppError | null {
  if (AppError.isAppError(err)) return err;

  const parserFailure = bodyParserFailure(err);
  if (parserFailure?.type === "entity.parse.failed") {
    return new ValidationError("Request body is not valid JSON");
  }
  if (parserFailure?.type === "entity.too.large") {
    return new AppError({
      message: "Request body too large",
      statusCode: 413,
      code: "payload_too_large",
    });
  }
  return null;
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
}

/**
 * Render every error as `{ error: { code, message, requestId } }`. Anything
 * that is not an AppError becomes a 500 whose details stay in the log.
 */
export function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const requestId = req.requestId ?? "unknown";
    const appError = toAppError(err);

    if (appError) {
      if (appError.statusCode >= 500) {
        logger.error({ err: appError, requestId }, appError.message);
      }
      if (appError instanceof RateLimitedError) {
        res.setHeader("Retry-After", String(appError.retryAfter));
      }
      setAuditError(res, appError.message);
      res.status(appError.statusCode).json(appError.toBody(requestId));
      return;
    }

    logger.error({ err, requestId, path: req.path }, "Unhandled error");
    setAuditError(res, "Internal server error");
    res.status(500).json({
      error: { code: "internal_error", message: "Internal server error", requestId },
    });
  };
}
