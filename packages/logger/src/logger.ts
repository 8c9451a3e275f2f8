/**
 * Creates pino loggers: pretty-printed in development, JSON elsewhere, with
 * credentials redacted and recipient addresses masked.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, maskAddresses } from "./redactor.js";
import type { LogBuffer } from "./log-buffer.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Also keep recent lines in memory, for GET /system/logs. */
  buffer?: LogBuffer;
  /** Replaces stdout as the main output. */
  destination?: pino.DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function stdout(): pino.DestinationStream {
  if (isDevelopment()) {
    return pino.transport({
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    });
  }
  return pino.destination(1);
}

/**
 * Create a new root logger. Tests get a silent logger unless a level is given.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const defaultLevel =
    process.env["NODE_ENV"] === "test" ? "silent" : isDevelopment() ? "debug" : "info";
  const level = options?.level ?? defaultLevel;
  const service = options?.service ?? "relaymail";

  const streams: pino.StreamEntry[] = [];
  if (level !== "silent") {
    streams.push({ level: "trace", stream: options?.destination ?? stdout() });
  }
  if (options?.buffer) {
    streams.push({ level: options.buffer.minLevel, stream: options.buffer });
  }

  return pino(
    {
      level,
      name: service,
      redact: {
        paths: REDACT_PATHS,
        censor: "[REDACTED]",
      },
      formatters: { log: maskAddresses },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );
}
