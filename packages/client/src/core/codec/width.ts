import { DecodingFailureError } from "../../errors/errors"

export function expectWidth(codec: string, width: number, bytes: Uint8Array): DataView {
  if (bytes.length !== width) {
    throw new DecodingFailureError(`${codec} needs exactly ${width} bytes, got ${bytes.length}`, {
      context: { codec, width, length: bytes.length },
    })
  }

  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
}

export function allocate(width: number): { bytes: Uint8Array; view: DataView } {
  const bytes = new Uint8Array(width)

  return { bytes, view: new DataView(bytes.buffer) }
}
