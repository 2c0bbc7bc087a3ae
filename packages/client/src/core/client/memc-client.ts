import { createNullLogger, type Logger } from "@memc/logger"
import {
  CacheMissError,
  DecodingFailureError,
  EncodingFailureError,
  TransportFailureError,
} from "../../errors/errors"
import { isMemcError } from "../../errors/is-memc-error"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { ClientConfig, SetOptions } from "../../ports/client-options"
import type { Codec } from "../../ports/codec"
import type { MemcacheTransport } from "../../ports/transport"
import type { TypedCache } from "../../ports/typed-cache"
import { checkKey } from "../key/check-key"
import { MAX_RELATIVE_TTL_SECONDS, toSeconds } from "../time/to-seconds"
import { CodecTypedCache } from "./codec-typed-cache"

type Operation = "set" | "get" | "delete"

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Typed front end over a byte-level {@link MemcacheTransport}.
 *
 * @remarks
 * Every call is one attempt. Keys, values and ttl are checked before the
 * transport is touched, so a rejected call never writes anything. Failures
 * reject with exactly one `MemcError` subclass; a miss is a result.
 */
export class MemcClient {
  private readonly logger: Logger
  private closed = false

  public constructor(
    readonly config: ClientConfig,
    private readonly transport: MemcacheTransport,
    logger: Logger = createNullLogger(),
  ) {
    this.logger = logger.child({ module: "memc", servers: config.servers.join(",") })
  }

  get servers(): readonly string[] {
    return this.config.servers
  }

  get dialTimeout(): number {
    return this.config.dialTimeout
  }

  get defaultTtl(): number {
    return this.config.defaultTtl
  }

  async set<T>(
    key: CacheKey,
    value: T,
    codec: Codec<T>,
    opts?: Partial<SetOptions>,
  ): Promise<void> {
    checkKey(key)
    const payload = this.encode(key, value, codec)
    const ttlSeconds = toSeconds(opts?.ttl ?? this.config.defaultTtl)

    if (ttlSeconds > MAX_RELATIVE_TTL_SECONDS) {
      this.logger.warn("ttl above 30 days is read by the server as a unix timestamp", {
        key,
        ttlSeconds,
      })
    }

    await this.dispatch("set", key, () => this.transport.store(key, ttlSeconds, 0, payload))
  }

  async get<T>(key: CacheKey, codec: Codec<T>): Promise<CacheResult<T>> {
    checkKey(key)

    const res = await this.dispatch("get", key, () => this.transport.retrieve(key))
    if (res.kind === "miss") return { kind: "miss" }

    return { kind: "hit", value: this.decode(key, res.value, codec) }
  }

  /**
   * Like {@link MemcClient.get}, for callers that treat absence as an error.
   *
   * @throws CacheMissError when the key is absent.
   */
  async getOrThrow<T>(key: CacheKey, codec: Codec<T>): Promise<T> {
    const res = await this.get(key, codec)
    if (res.kind === "miss") throw new CacheMissError(key)

    return res.value
  }

  /**
   * @returns `true` if an entry was removed.
   */
  async delete(key: CacheKey): Promise<boolean> {
    checkKey(key)

    return this.dispatch("delete", key, () => this.transport.remove(key))
  }

  typed<T>(codec: Codec<T>): TypedCache<T> {
    return new CodecTypedCache(this, codec)
  }

  /**
   * Release transport connections. Later calls reject with
   * `TransportFailureError`; closing twice is a no-op.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    await this.transport.close()
    this.logger.debug("client closed", { op: "close" })
  }

  private encode<T>(key: CacheKey, value: T, codec: Codec<T>): Uint8Array {
    try {
      return codec.encode(value)
    } catch (err) {
      if (isMemcError(err, "encoding_failure")) throw err

      throw new EncodingFailureError(`Cannot encode value for "${key}": ${describe(err)}`, {
        context: { key },
        cause: err,
      })
    }
  }

  private decode<T>(key: CacheKey, bytes: Uint8Array, codec: Codec<T>): T {
    try {
      return codec.decode(bytes)
    } catch (err) {
      if (isMemcError(err, "decoding_failure")) throw err

      throw new DecodingFailureError(`Cannot decode value of "${key}": ${describe(err)}`, {
        context: { key, length: bytes.length },
        cause: err,
      })
    }
  }

  private async dispatch<R>(op: Operation, key: CacheKey, call: () => Promise<R>): Promise<R> {
    if (this.closed) {
      throw new TransportFailureError(`Cannot ${op} "${key}": client is closed`, {
        context: { op, key },
      })
    }

    const started = performance.now()

    try {
      const res = await call()
      this.logger.debug(`${op} ok`, { op, key, durationMs: performance.now() - started })

      return res
    } catch (err) {
      this.logger.warn(`${op} failed`, { op, key, err })

      if (isMemcError(err, "transport_failure")) throw err

      throw new TransportFailureError(`${op} "${key}" failed: ${describe(err)}`, {
        context: { op, key },
        cause: err,
      })
    }
  }
}
