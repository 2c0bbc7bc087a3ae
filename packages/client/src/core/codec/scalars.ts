import { DecodingFailureError, EncodingFailureError } from "../../errors/errors"
import type { Codec } from "../../ports/codec"
import { allocate, expectWidth } from "./width"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })
const loneSurrogate = /\p{Cs}/u

/**
 * Raw bytes. Encoding passes the input through; decoding returns a copy so
 * callers never alias a transport buffer.
 */
export const bytes: Codec<Uint8Array> = {
  encode(value) {
    if (!(value instanceof Uint8Array)) {
      throw new EncodingFailureError("bytes codec needs a Uint8Array", {
        context: { codec: "bytes", type: typeof value },
      })
    }

    return value
  },
  decode(input) {
    return new Uint8Array(input)
  },
}

/**
 * UTF-8 text.
 *
 * @remarks
 * Strings with unpaired surrogates have no UTF-8 form and are rejected.
 * Decoding is strict: malformed UTF-8 fails instead of turning into U+FFFD.
 * A leading byte-order mark is kept as part of the string.
 */
export const text: Codec<string> = {
  encode(value) {
    if (typeof value !== "string") {
      throw new EncodingFailureError("text codec needs a string", {
        context: { codec: "text", type: typeof value },
      })
    }
    if (loneSurrogate.test(value)) {
      throw new EncodingFailureError("text contains an unpaired surrogate", {
        context: { codec: "text" },
      })
    }

    return encoder.encode(value)
  },
  decode(input) {
    try {
      return decoder.decode(input)
    } catch (err) {
      throw new DecodingFailureError("bytes are not valid UTF-8", {
        context: { codec: "text", length: input.length },
        cause: err,
      })
    }
  },
}

export const bool: Codec<boolean> = {
  width: 1,
  encode(value) {
    if (typeof value !== "boolean") {
      throw new EncodingFailureError("bool codec needs a boolean", {
        context: { codec: "bool", type: typeof value },
      })
    }

    return new Uint8Array([value ? 1 : 0])
  },
  decode(input) {
    const byte = expectWidth("bool", 1, input).getUint8(0)

    if (byte > 1) {
      throw new DecodingFailureError(`bool byte must be 0 or 1, got ${byte}`, {
        context: { codec: "bool", byte },
      })
    }

    return byte === 1
  },
}

/**
 * IEEE-754 single precision. Only values a float32 holds exactly are
 * accepted, so decoding returns the number that was stored.
 */
export const float32: Codec<number> = {
  width: 4,
  encode(value) {
    if (typeof value !== "number") {
      throw new EncodingFailureError("float32 codec needs a number", {
        context: { codec: "float32", type: typeof value },
      })
    }
    if (!Number.isNaN(value) && Math.fround(value) !== value) {
      throw new EncodingFailureError(`float32 cannot represent ${value} exactly`, {
        context: { codec: "float32", value },
      })
    }

    const { bytes: out, view } = allocate(4)
    view.setFloat32(0, value, true)

    return out
  },
  decode(input) {
    return expectWidth("float32", 4, input).getFloat32(0, true)
  },
}

export const float64: Codec<number> = {
  width: 8,
  encode(value) {
    if (typeof value !== "number") {
      throw new EncodingFailureError("float64 codec needs a number", {
        context: { codec: "float64", type: typeof value },
      })
    }

    const { bytes: out, view } = allocate(8)
    view.setFloat64(0, value, true)

    return out
  },
  decode(input) {
    return expectWidth("float64", 8, input).getFloat64(0, true)
  },
}
