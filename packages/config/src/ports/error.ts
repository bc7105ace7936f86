export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (paths, argument counts, errno
 * details) so callers never have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * `true` for expected runtime failures (a missing or unreadable file,
   * malformed content), `false` for programmer errors such as passing two
   * sources to a loader.
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}
