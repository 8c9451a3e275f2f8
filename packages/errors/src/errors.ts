import { AppError } from "./app-error.js";
import type { ErrorBody } from "./app-error.js";

interface ErrorOptions {
  requestId?: string;
  details?: Record<string, unknown>;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorOptions) {
    super({
      message,
      statusCode: 404,
      code: "not_found",
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Invalid or missing API key", options?: ErrorOptions) {
    super({
      message,
      statusCode: 401,
      code: "unauthorized",
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden", options?: ErrorOptions) {
    super({
      message,
      statusCode: 403,
      code: "forbidden",
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", code = "conflict", options?: ErrorOptions) {
    super({
      message,
      statusCode: 409,
      code,
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

export class DomainExistsError extends ConflictError {
  constructor(name: string, options?: ErrorOptions) {
    super(`Domain already exists: ${name}`, "domain_exists", options);
  }
}

export class DomainNotVerifiedError extends AppError {
  constructor(domainName: string, options?: ErrorOptions) {
    super({
      message: `Domain is not verified for sending: ${domainName}`,
      statusCode: 409,
      code: "domain_not_verified",
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

export class RateLimitedError extends AppError {
  public readonly retryAfter: number;

  constructor(message = "Too many requests", retryAfter: number, options?: ErrorOptions) {
    super({
      message,
      statusCode: 429,
      code: "rate_limited",
      requestId: options?.requestId,
      details: options?.details,
    });
    this.retryAfter = retryAfter;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Invalid request body", fields: Record<string, string> = {}, options?: ErrorOptions) {
    super({
      message,
      statusCode: 400,
      code: "invalid_request",
      requestId: options?.requestId,
      details: options?.details,
    });
    this.fields = fields;
  }

  override toBody(requestId: string): ErrorBody {
    const body = super.toBody(requestId);
    if (Object.keys(this.fields).length > 0) {
      body.error.fields = this.fields;
    }
    return body;
  }
}

export class InvalidSenderError extends AppError {
  constructor(message = "Invalid sender address", options?: ErrorOptions) {
    super({
      message,
      statusCode: 400,
      code: "invalid_sender_prefix",
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

export class InvalidRecipientError extends AppError {
  constructor(address: string, options?: ErrorOptions) {
    super({
      message: `Invalid recipient email: ${address}`,
      statusCode: 400,
      code: "invalid_recipient_email",
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "provider_error",
      requestId: options?.requestId,
      details: options?.details,
    });
    this.service = service;
  }
}
