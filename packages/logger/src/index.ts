export { NullLogger, createNullLogger } from "./adapters/null/null-logger"
export {
  PinoLogger,
  createPinoLogger,
  type PinoLoggerOptions,
} from "./adapters/pino/pino-logger"
export type {
  LogContext,
  LogContextPatch,
  LogEvent,
  LogMeta,
} from "./ports/log-context"
export type { LogLevelName } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
