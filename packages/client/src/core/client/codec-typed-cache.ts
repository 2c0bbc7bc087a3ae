import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { SetOptions } from "../../ports/client-options"
import type { Codec } from "../../ports/codec"
import type { TypedCache } from "../../ports/typed-cache"
import type { MemcClient } from "./memc-client"

export class CodecTypedCache<T> implements TypedCache<T> {
  public constructor(
    private readonly client: MemcClient,
    private readonly codec: Codec<T>,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<T>> {
    return this.client.get(key, this.codec)
  }

  async getOrThrow(key: CacheKey): Promise<T> {
    return this.client.getOrThrow(key, this.codec)
  }

  async set(key: CacheKey, value: T, opts?: Partial<SetOptions>): Promise<void> {
    await this.client.set(key, value, this.codec, opts)
  }

  async delete(key: CacheKey): Promise<boolean> {
    return this.client.delete(key)
  }
}
