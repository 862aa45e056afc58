/**
 * @mapper-activity/logger - Structured Logging Package
 *
 * pino loggers shared by every pipeline stage. Loggers are created once per
 * component name and re-levelled together when the CLI parses `--log-level`.
 *
 * Usage:
 * ```ts
 * import { createLogger } from "@mapper-activity/logger";
 *
 * const log = createLogger("catalog");
 * log.info({ ds }, "Pinned partition");
 * ```
 */

import { pino, type Logger } from "pino";

// ============================================================================
// Configuration
// ============================================================================

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const NODE_ENV = process.env["NODE_ENV"] ?? "production";
const SERVICE_NAME = process.env["SERVICE_NAME"] ?? "mapper-activity";

const ENV_LEVEL = process.env["LOG_LEVEL"] ?? "info";

let currentLevel: LogLevel = isLogLevel(ENV_LEVEL) ? ENV_LEVEL : "info";

const loggers = new Map<string, Logger>();

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Logger for a pipeline component. Repeated calls with the same name return
 * the same instance.
 */
export function createLogger(name: string): Logger {
  const existing = loggers.get(name);
  if (existing) return existing;

  const log = pino({
    name: `${SERVICE_NAME}:${name}`,
    level: currentLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport:
      NODE_ENV === "development"
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
      component: name,
    },
  });
  loggers.set(name, log);
  return log;
}

/** Change the level of every logger, including ones created later */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  for (const log of loggers.values()) {
    log.level = level;
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

// ============================================================================
// Secrets
// ============================================================================

/** Keep the first and last four characters of a secret */
export function maskSecret(value: string | undefined): string {
  if (!value) return "<unset>";
  if (value.length <= 8) return "***";
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

export type { Logger } from "pino";
