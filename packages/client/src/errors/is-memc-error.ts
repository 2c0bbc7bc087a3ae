import type { MemcErrorCode } from "./errors"
import { MemcError } from "./memc-error"

/**
 * Type guard for client errors, optionally narrowed to one code.
 *
 * @example
 * ```ts
 * try {
 *   await client.set(key, value, codecs.text)
 * } catch (err) {
 *   if (isMemcError(err, "transport_failure")) scheduleRetry()
 *   else throw err
 * }
 * ```
 */
export function isMemcError<C extends MemcErrorCode>(
  err: unknown,
  code?: C,
): err is MemcError<C> {
  if (!(err instanceof MemcError)) return false
  if (code === undefined) return true

  return err.code === code
}
