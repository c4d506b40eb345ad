/**
 * @shortly/logger - Structured Logging Package
 *
 * Consistent structured logging across Shortly services.
 * Uses pino for JSON logging.
 *
 * Usage:
 * ```ts
 * import { createLogger } from "@shortly/logger";
 *
 * const log = createLogger("shortener");
 * log.warn({ attempt: 2 }, "Short code collision, retrying");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "shortly";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface LoggerOptions {
  /** Overrides LOG_LEVEL; "silent" disables output */
  level?: LogLevel | "silent";
  /**
   * Write JSON lines here instead of stdout.
   * Disables the pretty transport.
   */
  destination?: pino.DestinationStream;
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const usePretty = NODE_ENV === "development" && !options.destination;

  const config: pino.LoggerOptions = {
    name: `${SERVICE_NAME}:${name}`,
    level: options.level ?? LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport: usePretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    base: {
      service: name,
      env: NODE_ENV,
    },
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}

// Re-export pino types for consumers
export type { Logger } from "pino";
