import { EncodingFailureError } from "../../errors/errors"
import type { Codec } from "../../ports/codec"
import { allocate, expectWidth } from "./width"

type Write<V> = (view: DataView, value: V) => void
type Read<V> = (view: DataView) => V

function rejectValue(codec: string, value: unknown, why: string): never {
  throw new EncodingFailureError(`${codec} cannot represent ${String(value)}: ${why}`, {
    context: { codec, value: String(value) },
  })
}

function numberInt(
  name: string,
  width: 1 | 2 | 4,
  range: readonly [number, number],
  write: Write<number>,
  read: Read<number>,
): Codec<number> {
  const [min, max] = range

  return {
    width,
    encode(value) {
      if (typeof value !== "number" || !Number.isInteger(value)) {
        rejectValue(name, value, "not an integer")
      }
      if (value < min || value > max) {
        rejectValue(name, value, `outside [${min}, ${max}]`)
      }

      const { bytes, view } = allocate(width)
      write(view, value)

      return bytes
    },
    decode(bytes) {
      return read(expectWidth(name, width, bytes))
    },
  }
}

function bigInt(
  name: string,
  range: readonly [bigint, bigint],
  write: Write<bigint>,
  read: Read<bigint>,
): Codec<bigint> {
  const [min, max] = range

  return {
    width: 8,
    encode(value) {
      if (typeof value !== "bigint") {
        rejectValue(name, value, "not a bigint")
      }
      if (value < min || value > max) {
        rejectValue(name, value, `outside [${min}, ${max}]`)
      }

      const { bytes, view } = allocate(8)
      write(view, value)

      return bytes
    },
    decode(bytes) {
      return read(expectWidth(name, 8, bytes))
    },
  }
}

export const int8 = numberInt(
  "int8",
  1,
  [-0x80, 0x7f],
  (v, n) => v.setInt8(0, n),
  (v) => v.getInt8(0),
)

export const uint8 = numberInt(
  "uint8",
  1,
  [0, 0xff],
  (v, n) => v.setUint8(0, n),
  (v) => v.getUint8(0),
)

export const int16 = numberInt(
  "int16",
  2,
  [-0x8000, 0x7fff],
  (v, n) => v.setInt16(0, n, true),
  (v) => v.getInt16(0, true),
)

export const uint16 = numberInt(
  "uint16",
  2,
  [0, 0xffff],
  (v, n) => v.setUint16(0, n, true),
  (v) => v.getUint16(0, true),
)

export const int32 = numberInt(
  "int32",
  4,
  [-0x8000_0000, 0x7fff_ffff],
  (v, n) => v.setInt32(0, n, true),
  (v) => v.getInt32(0, true),
)

export const uint32 = numberInt(
  "uint32",
  4,
  [0, 0xffff_ffff],
  (v, n) => v.setUint32(0, n, true),
  (v) => v.getUint32(0, true),
)

export const int64 = bigInt(
  "int64",
  [-(2n ** 63n), 2n ** 63n - 1n],
  (v, n) => v.setBigInt64(0, n, true),
  (v) => v.getBigInt64(0, true),
)

export const uint64 = bigInt(
  "uint64",
  [0n, 2n ** 64n - 1n],
  (v, n) => v.setBigUint64(0, n, true),
  (v) => v.getBigUint64(0, true),
)

/** Platform-width signed integer, always 64 bits on the wire. */
export const int: Codec<bigint> = int64

/** Platform-width unsigned integer, always 64 bits on the wire. */
export const uint: Codec<bigint> = uint64
