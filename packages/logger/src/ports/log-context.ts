export type LogContext = {
  module: string

  /** Provenance of a load, e.g. "mapping", "file:/srv/app/config.yaml" */
  source: string
  file: string

  /** Keys written by a load */
  loaded: number
  /** Keys a load rejected because they are not constant-style */
  skipped: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
