import { MAX_RELATIVE_TTL_SECONDS } from "../../core/time/to-seconds"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import { systemTime, type TimeSource } from "../../ports/clock"
import type { Milliseconds, Seconds } from "../../ports/time"
import type { MemcacheTransport } from "../../ports/transport"

/** memcached's default item size limit (`-I 1m`). */
export const DEFAULT_MAX_ITEM_BYTES = 1024 * 1024

export type MemoryTransportOptions = {
  /**
   * Largest payload accepted by `store`. Larger payloads are refused the
   * way memcached refuses them.
   */
  maxItemBytes: number
}

export type MemoryTransportDeps = {
  clock: TimeSource
}

export type MemoryEntry = {
  payload: Uint8Array
  flags: number
  expiresAtMs?: Milliseconds
}

/**
 * In-process stand-in for a memcached server.
 *
 * @remarks
 * Mirrors the server's expiration rule: ttl values up to 30 days are
 * relative seconds, larger ones are absolute unix timestamps.
 */
export class MemoryTransport implements MemcacheTransport {
  private readonly entries = new Map<CacheKey, MemoryEntry>()
  private readonly deps: MemoryTransportDeps
  private readonly opts: MemoryTransportOptions
  private closed = false

  public constructor(
    deps: Partial<MemoryTransportDeps> = {},
    opts: Partial<MemoryTransportOptions> = {},
  ) {
    this.deps = { clock: deps.clock ?? systemTime }
    this.opts = { maxItemBytes: opts.maxItemBytes ?? DEFAULT_MAX_ITEM_BYTES }
  }

  async store(
    key: CacheKey,
    ttlSeconds: Seconds,
    flags: number,
    payload: Uint8Array,
  ): Promise<void> {
    this.ensureOpen()

    if (payload.length > this.opts.maxItemBytes) {
      throw new Error(
        `SERVER_ERROR object too large for cache (${payload.length} > ${this.opts.maxItemBytes})`,
      )
    }

    const entry: MemoryEntry = { payload: new Uint8Array(payload), flags }
    if (ttlSeconds > 0) entry.expiresAtMs = this.toExpiresAtMs(ttlSeconds)

    this.entries.set(key, entry)
  }

  async retrieve(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    this.ensureOpen()

    const entry = this.live(key)
    if (entry === undefined) return { kind: "miss" }

    return { kind: "hit", value: new Uint8Array(entry.payload) }
  }

  async remove(key: CacheKey): Promise<boolean> {
    this.ensureOpen()

    const entry = this.live(key)
    if (entry === undefined) return false

    return this.entries.delete(key)
  }

  async close(): Promise<void> {
    this.closed = true
    this.entries.clear()
  }

  /**
   * Copy of the stored entry, read without expiring it.
   */
  peek(key: CacheKey): MemoryEntry | undefined {
    const entry = this.entries.get(key)
    if (entry === undefined) return undefined

    return { ...entry, payload: new Uint8Array(entry.payload) }
  }

  private live(key: CacheKey): MemoryEntry | undefined {
    const entry = this.entries.get(key)
    if (entry === undefined) return undefined

    if (entry.expiresAtMs !== undefined && entry.expiresAtMs <= this.deps.clock.nowMs()) {
      this.entries.delete(key)
      return undefined
    }

    return entry
  }

  private toExpiresAtMs(ttlSeconds: Seconds): Milliseconds {
    if (ttlSeconds > MAX_RELATIVE_TTL_SECONDS) return ttlSeconds * 1000

    return this.deps.clock.nowMs() + ttlSeconds * 1000
  }

  private ensureOpen(): void {
    if (this.closed) throw new Error("memory transport is closed")
  }
}
