import type { CacheKey } from "./cache-key"
import type { CacheResult } from "./cache-result"
import type { Seconds } from "./time"

/**
 * MemcacheTransport is the byte-level boundary to one or more memcached
 * endpoints.
 *
 * @remarks
 * - Keys arrive validated and payloads arrive encoded; transports do not
 *   interpret either.
 * - Failures are thrown as-is; the client maps them to
 *   `TransportFailureError`.
 * - Transports must accept concurrent calls for unrelated keys; pooling
 *   and routing across endpoints is theirs.
 */
export interface MemcacheTransport {
  /**
   * Store `payload` under `key`.
   *
   * @param ttlSeconds Relative expiration in seconds; `0` never expires.
   * @param flags Opaque per-item metadata, stored alongside the payload.
   */
  store(key: CacheKey, ttlSeconds: Seconds, flags: number, payload: Uint8Array): Promise<void>

  /**
   * Retrieve the payload stored under `key`, or a miss.
   */
  retrieve(key: CacheKey): Promise<CacheResult<Uint8Array>>

  /**
   * Remove the entry under `key`.
   *
   * @returns `true` if an entry was removed, `false` if none existed.
   */
  remove(key: CacheKey): Promise<boolean>

  /**
   * Release connections. Must be safe to call more than once.
   */
  close(): Promise<void>
}
