import type { Logger } from "../../ports/logger"
import type { LogContextPatch } from "../../ports/log-context"
import { PinoLogger, type PinoLoggerOptions } from "./pino-logger"

/**
 * Builds a pino-backed logger scoped to `bindings`.
 *
 * @example
 * ```ts
 * const logger = createPinoLogger({ level: "info" }, { service: "catalog" })
 * ```
 */
export function createPinoLogger(
  opts: Partial<PinoLoggerOptions> = {},
  bindings: LogContextPatch = {},
): Logger {
  return new PinoLogger(opts, bindings)
}
