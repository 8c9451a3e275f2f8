export { AppError } from "./app-error.js";
export type { AppErrorOptions, ErrorBody } from "./app-error.js";

export {
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

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitState } from "./circuit-breaker.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";

export { errorMessage } from "./error-message.js";
