import type { AppError, ErrorCode, ErrorContext } from "../ports/error"

export type ConfigErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export class ConfigError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: ConfigErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * A loader was called with arguments it cannot accept, or a key that is not
 * constant-style was written directly. Nothing is written to the store.
 */
export class ConfigArgumentError extends ConfigError<"config_argument_invalid"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "config_argument_invalid", context, isOperational: false })
  }
}

export type SystemErrorDetails = {
  /** Node's string code, e.g. "ENOENT" */
  systemCode: string | undefined
  errno: number | undefined
  syscall: string | undefined
}

export function systemErrorDetails(err: unknown): SystemErrorDetails {
  if (typeof err !== "object" || err === null) {
    return { systemCode: undefined, errno: undefined, syscall: undefined }
  }

  const code = "code" in err ? err.code : undefined
  const errno = "errno" in err ? err.errno : undefined
  const syscall = "syscall" in err ? err.syscall : undefined

  return {
    systemCode: typeof code === "string" ? code : undefined,
    errno: typeof errno === "number" ? errno : undefined,
    syscall: typeof syscall === "string" ? syscall : undefined,
  }
}

const MISSING_FILE_CODES: ReadonlySet<string> = new Set(["ENOENT", "EISDIR"])

/** `true` for the read failures `silent` may suppress: no such file, or a directory. */
export function isMissingFileError(err: unknown): boolean {
  const { systemCode } = systemErrorDetails(err)

  return systemCode !== undefined && MISSING_FILE_CODES.has(systemCode)
}

/**
 * A configuration file could not be read.
 *
 * The original system error stays available as `cause`, and its errno
 * details are copied onto the error and into `context`.
 */
export class ConfigFileError extends ConfigError<"config_file_unreadable"> {
  readonly path: string
  readonly systemCode: string | undefined
  readonly errno: number | undefined
  readonly syscall: string | undefined

  constructor(filePath: string, cause: unknown) {
    const details = systemErrorDetails(cause)
    const reason = cause instanceof Error ? cause.message : String(cause)

    super(`Unable to load configuration file: ${reason}`, {
      code: "config_file_unreadable",
      context: { path: filePath, ...details },
      cause,
    })

    this.path = filePath
    this.systemCode = details.systemCode
    this.errno = details.errno
    this.syscall = details.syscall
  }
}

/** A deserializer returned something that is not a mapping. */
export class ConfigFormatError extends ConfigError<"config_format_invalid"> {
  readonly path: string

  constructor(filePath: string, issues: string) {
    super(`Configuration file ${filePath} did not deserialize to a mapping:\n${issues}`, {
      code: "config_format_invalid",
      context: { path: filePath },
    })

    this.path = filePath
  }
}
