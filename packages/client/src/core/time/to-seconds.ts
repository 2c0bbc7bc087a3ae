import { ExpirationNotValidError } from "../../errors/errors"
import type { Milliseconds, Seconds } from "../../ports/time"

/**
 * Largest ttl memcached reads as relative seconds. Larger values are taken
 * as absolute unix timestamps by the server.
 */
export const MAX_RELATIVE_TTL_SECONDS: Seconds = 30 * 24 * 60 * 60

/**
 * Convert a duration to the whole-second ttl memcached expects.
 *
 * @remarks
 * The result is always relative seconds, including above
 * {@link MAX_RELATIVE_TTL_SECONDS}, where the server will read it as a
 * timestamp in 1970 and expire the entry at once. Callers that need longer
 * lifetimes must stay under the threshold for now.
 *
 * @throws ExpirationNotValidError if `duration` is negative, not finite, or
 * not an exact multiple of one second.
 */
export function toSeconds(duration: Milliseconds): Seconds {
  if (duration === 0) return 0

  if (!Number.isSafeInteger(duration) || duration < 0) {
    throw new ExpirationNotValidError(
      `Expiration must be a non-negative whole number of milliseconds, got ${duration}`,
      { context: { duration } },
    )
  }

  if (duration % 1000 !== 0) {
    throw new ExpirationNotValidError(
      `Expiration must be whole seconds, got ${duration}ms`,
      { context: { duration } },
    )
  }

  return duration / 1000
}
