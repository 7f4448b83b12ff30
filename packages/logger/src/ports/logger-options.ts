import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Every adapter honors them in
 * its own way.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit; entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Pretty-print for humans instead of one JSON object per line.
   *
   * @remarks
   * Meant for local development. Keep structured output in production.
   */
  prettify?: boolean
}
