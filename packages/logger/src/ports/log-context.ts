/**
 * Well-known fields attached to client log entries.
 *
 * @remarks
 * `op` names the client operation (`set`, `get`, `delete`, `close`),
 * `servers` the comma-joined endpoint list the client routes against.
 */
export type LogContext = {
  service: string
  module: string

  op: string
  key: string
  servers: string

  durationMs: number
  ttlSeconds: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
