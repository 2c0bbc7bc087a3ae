/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and the opaque bytes a memcached server stores.
 *
 * @remarks
 * Codecs are the only place where width, sign and structure survive the
 * trip through the cache. They must be pure and deterministic, and must
 * throw rather than truncate or reinterpret:
 * - `encode` throws `EncodingFailureError` for values it cannot represent
 * - `decode` throws `DecodingFailureError` when the bytes do not have the
 *   layout the codec expects
 *
 * Transports treat codec output as opaque bytes and never import codecs.
 *
 * @example
 * ```ts
 * const person = codecs.record({ name: codecs.text, age: codecs.int })
 *
 * await client.set("person:1", { name: "bob", age: 32n }, person)
 * ```
 */
export interface Codec<T> {
  /**
   * Number of bytes every encoding occupies, for fixed-width codecs.
   *
   * Composite codecs write fixed-width fields raw and length-prefix the
   * rest, so this must be set exactly when the width never varies.
   */
  readonly width?: number

  /**
   * Encode a value into bytes suitable for storage.
   */
  encode(value: T): Uint8Array

  /**
   * Decode bytes previously produced by `encode` back into a value.
   */
  decode(bytes: Uint8Array): T
}

/**
 * The value type a codec produces.
 *
 * @example
 * ```ts
 * type Person = CodecValue<typeof person>
 * ```
 */
export type CodecValue<C> = C extends Codec<infer T> ? T : never
