import { DecodingFailureError, EncodingFailureError } from "../../errors/errors"
import type { Codec } from "../../ports/codec"
import { readMember, SegmentReader, SegmentWriter, writeMember } from "./segments"

/**
 * Ordered field schema: one codec per field, in declaration order.
 *
 * The order of the object literal is the byte layout, so reordering fields
 * changes the encoding.
 */
export type RecordFields<T> = { readonly [K in keyof T]: Codec<T[K]> }

function hasFields<T extends object>(
  values: Partial<T>,
  names: readonly (keyof T)[],
): values is T {
  return names.every((name) => name in values)
}

function recordCodec<T extends object, R extends T>(
  fields: RecordFields<T>,
  build: (values: T) => R,
): Codec<R> {
  const names = Object.keys(fields) as Array<keyof T & string>

  return {
    encode(value) {
      if (typeof value !== "object" || value === null) {
        throw new EncodingFailureError("record codec needs an object", {
          context: { codec: "record", type: value === null ? "null" : typeof value },
        })
      }

      const source: T = value
      const writer = new SegmentWriter()

      for (const name of names) {
        writeMember(writer, fields[name], source[name], name)
      }

      return writer.finish()
    },
    decode(bytes) {
      const reader = new SegmentReader(bytes, "record")
      const values: Partial<T> = {}

      for (const name of names) {
        values[name] = readMember(reader, fields[name], name)
      }

      reader.finish()

      if (!hasFields(values, names)) {
        throw new DecodingFailureError("record is missing fields", {
          context: { codec: "record", fields: names },
        })
      }

      return build(values)
    },
  }
}

/**
 * Structural codec for records.
 *
 * @remarks
 * Fixed-width fields are written raw, everything else is prefixed with its
 * byte length, so the layout needs no external schema beyond `fields`.
 *
 * Without `build`, values decode to plain objects. Pass `build` to decode
 * into another shape, such as a class instance.
 *
 * @example
 * ```ts
 * const person = record({ name: text, age: int })
 * person.encode({ name: "bob", age: 32n }).length // 4 + 3 + 8 = 15
 *
 * const personRef = record({ name: text, age: int }, (v) => new Person(v.name, v.age))
 * ```
 */
export function record<T extends object>(fields: RecordFields<T>): Codec<T>
export function record<T extends object, R extends T>(
  fields: RecordFields<T>,
  build: (values: T) => R,
): Codec<R>
export function record<T extends object, R extends T>(
  fields: RecordFields<T>,
  build?: (values: T) => R,
): Codec<T> | Codec<R> {
  if (build) return recordCodec(fields, build)

  return recordCodec(fields, (values: T) => values)
}
