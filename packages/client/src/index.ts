export { createClient, type CreateClientDeps } from "./adapters/memjs/create"
export {
  createMemjsBytesClient,
  type MemjsBytesClient,
  type MemjsClientOptions,
} from "./adapters/memjs/memjs-client"
export { MemjsTransport } from "./adapters/memjs/memjs-transport"
export { createMemoryClient, type MemoryClientDeps } from "./adapters/memory/create"
export {
  DEFAULT_MAX_ITEM_BYTES,
  type MemoryEntry,
  MemoryTransport,
  type MemoryTransportDeps,
  type MemoryTransportOptions,
} from "./adapters/memory/memory-transport"
export * from "./config"
export { defaultClientOptions, resolveClientConfig } from "./core/client/client-config"
export { CodecTypedCache } from "./core/client/codec-typed-cache"
export { MemcClient } from "./core/client/memc-client"
export { codecs } from "./core/codec/codecs"
export {
  int,
  int8,
  int16,
  int32,
  int64,
  uint,
  uint8,
  uint16,
  uint32,
  uint64,
} from "./core/codec/integers"
export { list } from "./core/codec/list"
export { type RecordFields, record } from "./core/codec/record"
export { bool, bytes, float32, float64, text } from "./core/codec/scalars"
export { checkKey, MAX_KEY_BYTES } from "./core/key/check-key"
export { MAX_RELATIVE_TTL_SECONDS, toSeconds } from "./core/time/to-seconds"
export * from "./errors"
export type { CacheKey } from "./ports/cache-key"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { ClientConfig, ClientOptions, SetOptions } from "./ports/client-options"
export { systemTime, type TimeSource } from "./ports/clock"
export type { Codec, CodecValue } from "./ports/codec"
export type { Milliseconds, Seconds } from "./ports/time"
export type { MemcacheTransport } from "./ports/transport"
export type { TypedCache } from "./ports/typed-cache"
