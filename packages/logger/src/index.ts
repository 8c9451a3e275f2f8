/**
 * @relaymail/logger
 *
 * Structured logging with secret and address redaction.
 */

export { createLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { LogBuffer, DEFAULT_LOG_BUFFER_CAPACITY } from "./log-buffer.js";
export type { BufferedLogEntry, LogQuery } from "./log-buffer.js";
export { maskEmail, maskAddresses, REDACT_PATHS } from "./redactor.js";
