/**
 * otakeeper Engine -- Structured Logger
 *
 * Wraps pino for structured logging. The engine, reconciler and HTTP
 * agent all log through loggers created here.
 *
 * Logs go synchronously to stderr through pino.destination() rather than
 * a transport, so a log line written right before a power cut or a
 * service restart is not lost in a worker thread.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Optional name bound to every line (e.g. "reconciler") */
  name?: string;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "info",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      name: opts.name,
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

/**
 * Parse a level name from configuration, falling back to "info".
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "silent":
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}

export type Logger = pino.Logger;
