import type { LogContextPatch } from "../log-context"
import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/**
 * One emitted entry, normalized across adapters.
 */
export type CapturedLog = {
  level: LogLevelName
  message: string
  payload: Record<string, unknown>
}

export type HarnessOptions = {
  level?: LogLevelName
  /** Context bound at construction, e.g. `{ service: "catalog" }`. */
  bindings?: LogContextPatch
}

export type LoggerHarness = {
  name: string
  make: (opts?: HarnessOptions) => {
    logger: Logger
    read: () => CapturedLog[]
    clear: () => void
  }
}
