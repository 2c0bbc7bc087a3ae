import { EncodingFailureError } from "../../errors/errors"
import type { Codec } from "../../ports/codec"
import { readMember, SegmentReader, SegmentWriter, writeMember } from "./segments"

/**
 * Homogeneous list: a uint32 element count followed by the elements.
 */
export function list<T>(element: Codec<T>): Codec<T[]> {
  return {
    encode(values) {
      if (!Array.isArray(values)) {
        throw new EncodingFailureError("list codec needs an array", {
          context: { codec: "list", type: typeof values },
        })
      }

      const writer = new SegmentWriter()
      writer.uint32(values.length)

      for (const [i, value] of values.entries()) {
        writeMember(writer, element, value, `[${i}]`)
      }

      return writer.finish()
    },
    decode(bytes) {
      const reader = new SegmentReader(bytes, "list")
      const count = reader.uint32()
      const out: T[] = []

      for (let i = 0; i < count; i++) {
        out.push(readMember(reader, element, `[${i}]`))
      }

      reader.finish()

      return out
    },
  }
}
