import { int, int8, int16, int32, int64, uint, uint8, uint16, uint32, uint64 } from "./integers"
import { list } from "./list"
import { record } from "./record"
import { bool, bytes, float32, float64, text } from "./scalars"

/**
 * Built-in codecs, grouped for discoverability.
 *
 * @example
 * ```ts
 * await client.set("hits", 12n, codecs.uint64)
 * const res = await client.get("hits", codecs.uint64)
 * ```
 */
export const codecs = {
  bytes,
  text,
  bool,
  float32,
  float64,
  int8,
  uint8,
  int16,
  uint16,
  int32,
  uint32,
  int64,
  uint64,
  int,
  uint,
  record,
  list,
} as const
