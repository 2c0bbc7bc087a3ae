export type CacheHit<T> = {
  kind: "hit"
  value: T
}

export type CacheMiss = {
  kind: "miss"
}

/**
 * Outcome of a read. A miss is expected, not a failure.
 */
export type CacheResult<T> = CacheHit<T> | CacheMiss
