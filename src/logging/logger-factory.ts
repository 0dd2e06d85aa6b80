/**
 * Logger Factory
 *
 * Root pino logger plus component-scoped child loggers. Output goes to stderr
 * so the admin CLI keeps stdout for its own tables and JSON.
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";
import { REDACT_OPTIONS } from "./redactors.js";

let rootLogger: pino.Logger | null = null;

function baseOptions(config: Pick<LoggerConfig, "level">): pino.LoggerOptions {
  return {
    level: config.level,
    redact: REDACT_OPTIONS,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

function createRootLogger(config: LoggerConfig): pino.Logger {
  const options = baseOptions(config);

  if (config.stream) {
    return pino(options, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Initialize the process-wide root logger
 *
 * Must be called once at startup before any component logs.
 *
 * @throws Error if the logger is already initialized
 *
 * @example
 * ```typescript
 * initializeLogger({ level: "info", format: "json" });
 * const logger = getComponentLogger("pipeline");
 * logger.info("Protection pipeline ready");
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ level: config.level, format: config.format }, "Logger initialized");
  } catch (error) {
    // pino-pretty missing or transport worker failed: keep JSON to stderr
    rootLogger = pino(baseOptions(config), pino.destination(2));
    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Get the root logger
 *
 * @throws Error if the logger is not initialized
 * @internal - application code should use getComponentLogger()
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Get a component-scoped child logger
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger("ratelimit", "req-123");
 * logger.warn({ ip }, "Rate limit exceeded");
 * // {"level":"warn","component":"ratelimit","requestId":"req-123",...}
 * ```
 */
export function getComponentLogger(component: string, requestId?: string): pino.Logger {
  const context: ComponentContext = {
    component,
    ...(requestId && { requestId }),
  };

  return getRootLogger().child(context);
}

/**
 * Clear the root logger so tests can re-initialize it
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}
