import { DecodingFailureError, EncodingFailureError } from "../../errors/errors"
import type { Codec } from "../../ports/codec"

const PREFIX_BYTES = 4
const MAX_SEGMENT_BYTES = 0xffff_ffff

/**
 * Accumulates the segments of a composite encoding.
 *
 * Fixed-width parts are appended raw; variable parts get a little-endian
 * uint32 byte-length prefix.
 */
export class SegmentWriter {
  private readonly parts: Uint8Array[] = []
  private size = 0

  raw(bytes: Uint8Array): void {
    this.parts.push(bytes)
    this.size += bytes.length
  }

  uint32(n: number): void {
    const header = new Uint8Array(PREFIX_BYTES)
    new DataView(header.buffer).setUint32(0, n, true)
    this.raw(header)
  }

  prefixed(bytes: Uint8Array): void {
    if (bytes.length > MAX_SEGMENT_BYTES) {
      throw new EncodingFailureError(`Segment of ${bytes.length} bytes exceeds the uint32 prefix`, {
        context: { bytes: bytes.length },
      })
    }

    this.uint32(bytes.length)
    this.raw(bytes)
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.size)
    let offset = 0

    for (const part of this.parts) {
      out.set(part, offset)
      offset += part.length
    }

    return out
  }
}

/**
 * Walks a composite encoding. Every read is bounds-checked and `finish()`
 * rejects trailing bytes.
 */
export class SegmentReader {
  private offset = 0

  constructor(
    private readonly bytes: Uint8Array,
    private readonly codecName: string,
  ) {}

  take(n: number): Uint8Array {
    const end = this.offset + n

    if (end > this.bytes.length) {
      throw new DecodingFailureError(
        `${this.codecName}: need ${n} bytes at offset ${this.offset}, have ${this.bytes.length - this.offset}`,
        { context: { codec: this.codecName, offset: this.offset, need: n } },
      )
    }

    const out = this.bytes.subarray(this.offset, end)
    this.offset = end

    return out
  }

  uint32(): number {
    const header = this.take(PREFIX_BYTES)

    return new DataView(header.buffer, header.byteOffset, PREFIX_BYTES).getUint32(0, true)
  }

  prefixed(): Uint8Array {
    return this.take(this.uint32())
  }

  finish(): void {
    if (this.offset !== this.bytes.length) {
      throw new DecodingFailureError(
        `${this.codecName}: ${this.bytes.length - this.offset} trailing bytes`,
        { context: { codec: this.codecName, length: this.bytes.length, consumed: this.offset } },
      )
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Encode one member of a composite, raw when the codec is fixed-width.
 */
export function writeMember<V>(
  writer: SegmentWriter,
  codec: Codec<V>,
  value: V,
  member: string,
): void {
  let encoded: Uint8Array
  try {
    encoded = codec.encode(value)
  } catch (err) {
    throw new EncodingFailureError(`${member}: ${describe(err)}`, {
      context: { member },
      cause: err,
    })
  }

  if (codec.width === undefined) {
    writer.prefixed(encoded)
    return
  }

  if (encoded.length !== codec.width) {
    throw new EncodingFailureError(
      `${member}: codec declares width ${codec.width} but produced ${encoded.length} bytes`,
      { context: { member, width: codec.width, produced: encoded.length } },
    )
  }

  writer.raw(encoded)
}

/**
 * Decode one member of a composite written by {@link writeMember}.
 */
export function readMember<V>(reader: SegmentReader, codec: Codec<V>, member: string): V {
  const segment = codec.width === undefined ? reader.prefixed() : reader.take(codec.width)

  try {
    return codec.decode(segment)
  } catch (err) {
    throw new DecodingFailureError(`${member}: ${describe(err)}`, {
      context: { member },
      cause: err,
    })
  }
}
