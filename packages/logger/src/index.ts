export type { LogContext, LogContextPatch, LogEvent, LogMeta, LogOutcome } from "./ports/log-context"
export { isLogLevelName, logLevelNames, LogLevels } from "./ports/log-level"
export type { LogLevel, LogLevelName } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"

export { NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger } from "./adapters/pino/pino-logger"
export type { PinoLoggerDeps } from "./adapters/pino/pino-logger"
