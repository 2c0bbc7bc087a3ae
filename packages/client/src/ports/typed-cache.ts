import type { CacheKey } from "./cache-key"
import type { SetOptions } from "./client-options"
import type { CacheResult } from "./cache-result"

/**
 * A client view bound to one codec, so call sites stop repeating it.
 */
export interface TypedCache<T> {
  get(key: CacheKey): Promise<CacheResult<T>>

  /**
   * Like `get`, but rejects with `CacheMissError` on a miss.
   */
  getOrThrow(key: CacheKey): Promise<T>

  set(key: CacheKey, value: T, opts?: Partial<SetOptions>): Promise<void>

  delete(key: CacheKey): Promise<boolean>
}
