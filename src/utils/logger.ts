/**
 * Logger Module
 * Structured logging using pino, pretty-printed to stderr during development
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export interface LoggerOptions {
  level?: LogLevel;
}

/** Loggers created without an explicit level follow {@link setLogLevel} */
const sharedLevelLoggers = new Set<PinoLogger>();

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

/**
 * Vitest sets VITEST; worker threads cannot host the pino-pretty transport there.
 */
function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

export function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "parser", "indexer", "retrieval")
 * @param options - Optional configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger("entity-extractor");
 * logger.info({ file: "pkg/base.py" }, "Extracted entities");
 * logger.error({ err }, "Failed to parse file");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const baseOptions: pino.LoggerOptions = {
    name: component,
    level: options.level ?? getLogLevel(),
  };

  const logger = buildLogger(baseOptions);
  if (options.level === undefined) {
    sharedLevelLoggers.add(logger);
  }
  return logger;
}

function buildLogger(baseOptions: pino.LoggerOptions): PinoLogger {
  if (isDevelopment() && !isTest()) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Applies a level to every logger created without an explicit one, including
 * module-level loggers created before configuration was loaded.
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of sharedLevelLoggers) {
    logger.level = level;
  }
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
