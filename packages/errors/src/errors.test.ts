import { describe, it, expect } from "vitest";
import { AppError } from "./app-error.js";
import {
  NotFoundError,
  UnauthorizedError,
  ForbiddenError,
  ConflictError,
  DomainExistsError,
  DomainNotVerifiedError,
  RateLimitedError,
  ValidationError,
  InvalidSenderError,
  InvalidRecipientError,
  ExternalServiceError,
} from "./errors.js";
import { errorMessage } from "./error-message.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "internal_error",
      isOperational: false,
      requestId: "req-1",
      details: { foo: "bar" },
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("internal_error");
    expect(err.isOperational).toBe(false);
    expect(err.requestId).toBe("req-1");
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
  });

  it("isAppError detects AppError instances", () => {
    expect(AppError.isAppError(new NotFoundError())).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
  });

  it("renders the wire body with the caller's request id", () => {
    const err = new NotFoundError("Domain not found");
    expect(err.toBody("req-9")).toEqual({
      error: { code: "not_found", message: "Domain not found", requestId: "req-9" },
    });
  });

  it("prefers a request id attached at construction", () => {
    const err = new ForbiddenError("nope", { requestId: "req-own" });
    expect(err.toBody("req-other").error.requestId).toBe("req-own");
  });
});

describe("Error subclasses", () => {
  it.each([
    [new NotFoundError(), 404, "not_found", "NotFoundError"],
    [new UnauthorizedError(), 401, "unauthorized", "UnauthorizedError"],
    [new ForbiddenError(), 403, "forbidden", "ForbiddenError"],
    [new ConflictError(), 409, "conflict", "ConflictError"],
    [new DomainExistsError("example.com"), 409, "domain_exists", "DomainExistsError"],
    [new DomainNotVerifiedError("example.com"), 409, "domain_not_verified", "DomainNotVerifiedError"],
    [new RateLimitedError("slow down", 60), 429, "rate_limited", "RateLimitedError"],
    [new ValidationError(), 400, "invalid_request", "ValidationError"],
    [new InvalidSenderError(), 400, "invalid_sender_prefix", "InvalidSenderError"],
    [new InvalidRecipientError("bad"), 400, "invalid_recipient_email", "InvalidRecipientError"],
    [new ExternalServiceError("down", "ses"), 502, "provider_error", "ExternalServiceError"],
  ])("%s maps to %i %s", (err, status, code, name) => {
    expect(err.statusCode).toBe(status);
    expect(err.code).toBe(code);
    expect(err.name).toBe(name);
    expect(err).toBeInstanceOf(AppError);
  });

  it("DomainExistsError is a ConflictError naming the domain", () => {
    const err = new DomainExistsError("example.com");
    expect(err).toBeInstanceOf(ConflictError);
    expect(err.message).toBe("Domain already exists: example.com");
  });

  it("ConflictError accepts a custom code", () => {
    const err = new ConflictError("Domain is in use", "domain_in_use");
    expect(err.code).toBe("domain_in_use");
  });

  it("RateLimitedError carries retryAfter", () => {
    expect(new RateLimitedError("slow down", 42).retryAfter).toBe(42);
  });

  it("InvalidRecipientError names the address", () => {
    expect(new InvalidRecipientError("nobody").message).toBe("Invalid recipient email: nobody");
  });

  it("ExternalServiceError keeps the service name", () => {
    expect(new ExternalServiceError("down", "cloudflare").service).toBe("cloudflare");
  });

  it("ValidationError includes fields in the body only when present", () => {
    const withFields = new ValidationError("Invalid request body", { name: "Required" });
    expect(withFields.toBody("r1")).toEqual({
      error: {
        code: "invalid_request",
        message: "Invalid request body",
        requestId: "r1",
        fields: { name: "Required" },
      },
    });
    expect(new ValidationError().toBody("r2").error.fields).toBeUndefined();
  });
});

describe("errorMessage", () => {
  it("reads Error messages", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  it("passes strings through", () => {
    expect(errorMessage("plain")).toBe("plain");
  });

  it("falls back for other values", () => {
    expect(errorMessage(42)).toBe("Unknown error");
  });
});
