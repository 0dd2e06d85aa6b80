/**
 * Logging Types and Interfaces
 *
 * @module logging/types
 */

/**
 * Log levels supported by the logger
 *
 * `silent` suppresses all output and is what the test suites use.
 */
export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default "info"
   */
  level: LogLevel;

  /**
   * Log output format
   * - json: one JSON object per line for log aggregation
   * - pretty: colorized output for local development
   * @default "json"
   */
  format: "json" | "pretty";

  /**
   * Optional custom output stream
   * @internal - used by tests to capture log lines
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Context bound to every line a component logger writes
 */
export interface ComponentContext {
  /**
   * Component name, colon-separated for hierarchy
   * (e.g. "auth:token-manager", "resilience:circuit-breaker")
   */
  component: string;

  /** Optional request/correlation ID */
  requestId?: string;
}

/**
 * Metric emitted as a structured log line
 *
 * Durations are milliseconds, counts are integers.
 */
export interface MetricFields {
  /** @example "token.issue_ms", "ratelimit.denied" */
  metric: string;
  value: number;
}
