import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerOptions = Partial<LoggerOptions> & {
  /**
   * Where JSON lines are written. Defaults to stdout.
   *
   * Takes precedence over `prettify`, which needs its own transport.
   */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase
  protected readonly opts: PinoLoggerOptions

  constructor(
    opts: PinoLoggerOptions = {},
    bindings: LogContextPatch = {},
    base?: PinoLoggerBase,
  ) {
    this.opts = opts
    this.logger = this.init(bindings, base)
  }

  private init(bindings: LogContextPatch, base?: PinoLoggerBase): PinoLoggerBase {
    if (base) return base.child(bindings)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        !this.opts.destination && {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "hostname",
            },
          },
        }),
    }

    const root = this.opts.destination
      ? pino(pinoOpts, this.opts.destination)
      : pino(pinoOpts)

    return root.child(bindings)
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    const fields: object = meta ?? {}

    this.logger[level](fields, message)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.opts, context, this.logger)
  }
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  opts: PinoLoggerOptions = {},
  bindings: LogContextPatch = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(opts, bindings)
}
