import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*: which levels are emitted and whether output
 * is rendered for humans. Adapters decide how to honor them.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development. Production should keep the
   * default structured JSON lines.
   */
  prettify?: boolean
}
