import { KeyNotValidError } from "../../errors/errors"
import type { CacheKey } from "../../ports/cache-key"

/** Longest key memcached accepts, in bytes. */
export const MAX_KEY_BYTES = 250

const forbidden = /[\s\p{Cc}]/u
const loneSurrogate = /\p{Cs}/u

/**
 * Reject keys memcached would refuse, before any network round-trip.
 *
 * @throws KeyNotValidError if the key is empty, longer than
 * {@link MAX_KEY_BYTES} UTF-8 bytes, contains whitespace or a control
 * character, or holds an unpaired surrogate, which has no UTF-8 form.
 */
export function checkKey(key: CacheKey): void {
  if (typeof key !== "string" || key.length === 0) {
    throw new KeyNotValidError("Key must be a non-empty string", {
      context: { key },
    })
  }

  const surrogate = loneSurrogate.exec(key)
  if (surrogate) {
    throw new KeyNotValidError("Key contains an unpaired surrogate", {
      context: { index: surrogate.index },
    })
  }

  const bytes = Buffer.byteLength(key, "utf8")
  if (bytes > MAX_KEY_BYTES) {
    throw new KeyNotValidError(`Key is ${bytes} bytes; the limit is ${MAX_KEY_BYTES}`, {
      context: { bytes, limit: MAX_KEY_BYTES },
    })
  }

  const match = forbidden.exec(key)
  if (match) {
    throw new KeyNotValidError("Key contains whitespace or a control character", {
      context: { key, index: match.index },
    })
  }
}
