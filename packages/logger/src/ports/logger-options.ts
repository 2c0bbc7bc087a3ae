import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Adapters must honor these options but choose how they are implemented.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. Entries below this level are dropped.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development. Leave off in production,
   * where structured JSON lines are expected.
   */
  prettify?: boolean
}
