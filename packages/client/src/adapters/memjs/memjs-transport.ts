import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { Seconds } from "../../ports/time"
import type { MemcacheTransport } from "../../ports/transport"
import type { MemjsBytesClient } from "./memjs-client"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * memcached transport over the memjs binary-protocol client.
 *
 * @remarks
 * memjs always writes item flags as `0`. Other flag values are refused
 * rather than silently dropped.
 */
export class MemjsTransport implements MemcacheTransport {
  private closed = false

  public constructor(private readonly client: MemjsBytesClient) {}

  async store(
    key: CacheKey,
    ttlSeconds: Seconds,
    flags: number,
    payload: Uint8Array,
  ): Promise<void> {
    if (flags !== 0) {
      throw new Error(`memjs cannot store item flags (got ${flags})`)
    }

    const value = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength)

    await this.client.set(key, value, { expires: ttlSeconds })
  }

  async retrieve(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const res = await this.client.get(key)

    return this.createCacheResult(res)
  }

  async remove(key: CacheKey): Promise<boolean> {
    const removed = await this.client.delete(key)

    return removed === true
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    this.client.close()
  }

  private createCacheResult(res: unknown): CacheResult<Uint8Array> {
    if (res === null || res === undefined) return { kind: "miss" }
    if (!isRecord(res)) throw new Error(`Unexpected memjs get result: ${typeof res}`)

    const value = res.value
    if (value === null || value === undefined) return { kind: "miss" }
    if (value instanceof Uint8Array) return { kind: "hit", value: new Uint8Array(value) }

    throw new Error(`Unexpected memjs value type: ${typeof value}`)
  }
}
