import type { LogLevelName } from "./log-level"

/**
 * Policy every adapter honors.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit; "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local development.
   * Leave off in production where JSON lines are collected.
   */
  prettify?: boolean
}
