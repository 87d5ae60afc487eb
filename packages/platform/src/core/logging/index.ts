/**
 * Structured Logging
 *
 * JSON-line logger. Every line carries a level, the module context and a
 * timestamp. Warnings and errors are also forwarded to the observability
 * provider.
 *
 * The threshold comes from LOG_LEVEL (debug | info | warn | error); it
 * defaults to "info" in production and "debug" elsewhere.
 */

import type { Logger } from "@rowguard/contracts";
import { captureMessage } from "../observability/index.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/** Resolved on every call so tests can flip LOG_LEVEL / NODE_ENV freely */
function threshold(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) return configured;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold()];
}

function line(level: LogLevel, context: string, message: string, data?: Record<string, unknown>): string {
  return JSON.stringify({
    level,
    context,
    message,
    ...data,
    timestamp: new Date().toISOString(),
  });
}

/**
 * Creates a structured logger.
 * Prefixes all messages with a context identifier.
 */
export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      if (enabled("info")) console.log(line("info", context, message, data));
    },
    warn(message, data) {
      if (enabled("warn")) console.warn(line("warn", context, message, data));
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      if (enabled("error")) console.error(line("error", context, message, data));
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (enabled("debug")) console.debug(line("debug", context, message, data));
    },
  };
}
