export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger } from "./adapters/pino/create"
export { PinoLogger, type PinoLoggerOptions } from "./adapters/pino/pino-logger"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export { isLogLevelName, logLevelNames, type LogLevelName } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
