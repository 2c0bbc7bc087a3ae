import type { TimeSource } from "../../../ports/clock"
import { bytes, keys } from "../../../tests/utils/client-test-helpers"
import { DEFAULT_MAX_ITEM_BYTES, MemoryTransport } from "../memory-transport"

describe("MemoryTransport", () => {
  let now: number
  const clock: TimeSource = { nowMs: () => now }

  let transport: MemoryTransport

  beforeEach(() => {
    now = 1_000_000
    transport = new MemoryTransport({ clock })
  })

  it("stores payload and flags", async () => {
    await transport.store(keys.one(), 0, 7, bytes.a())

    expect(transport.peek(keys.one())).toEqual({ payload: bytes.a(), flags: 7 })
    await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({
      kind: "hit",
      value: bytes.a(),
    })
  })

  it("copies payloads in and out", async () => {
    const input = bytes.a()
    await transport.store(keys.one(), 0, 0, input)
    input[0] = 99

    const first = await transport.retrieve(keys.one())
    if (first.kind === "hit") first.value[1] = 99

    await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({
      kind: "hit",
      value: bytes.a(),
    })
  })

  it("peek() hands out a copy of the entry", async () => {
    await transport.store(keys.one(), 0, 7, bytes.a())

    const peeked = transport.peek(keys.one())
    peeked?.payload.fill(0)
    if (peeked) peeked.flags = 1

    expect(transport.peek(keys.one())).toEqual({ payload: bytes.a(), flags: 7 })
    await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({
      kind: "hit",
      value: bytes.a(),
    })
  })

  it("misses unknown keys", async () => {
    await expect(transport.retrieve(keys.two())).resolves.toStrictEqual({ kind: "miss" })
  })

  it("reads ttl up to 30 days as relative seconds", async () => {
    await transport.store(keys.one(), 2592000, 0, bytes.a())

    expect(transport.peek(keys.one())?.expiresAtMs).toBe(1_000_000 + 2592000 * 1000)
  })

  it("reads ttl above 30 days as an absolute unix timestamp", async () => {
    now = 5_000_000_000
    await transport.store(keys.one(), 2592001, 0, bytes.a())

    expect(transport.peek(keys.one())?.expiresAtMs).toBe(2592001 * 1000)
    await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({ kind: "miss" })
  })

  it("expires at the deadline", async () => {
    await transport.store(keys.one(), 2, 0, bytes.a())

    now += 1999
    await expect(transport.retrieve(keys.one())).resolves.toMatchObject({ kind: "hit" })

    now += 1
    await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({ kind: "miss" })
    expect(transport.peek(keys.one())).toBeUndefined()
  })

  it("does not report an expired entry as removed", async () => {
    await transport.store(keys.one(), 1, 0, bytes.a())
    now += 1000

    await expect(transport.remove(keys.one())).resolves.toBe(false)
  })

  it("refuses payloads above the item size limit", async () => {
    const small = new MemoryTransport({ clock }, { maxItemBytes: 2 })

    await expect(small.store(keys.one(), 0, 0, bytes.a())).rejects.toThrow(
      "SERVER_ERROR object too large for cache (3 > 2)",
    )
    await expect(small.store(keys.one(), 0, 0, new Uint8Array(2))).resolves.toBeUndefined()
  })

  it("defaults the item size limit to 1 MiB", async () => {
    expect(DEFAULT_MAX_ITEM_BYTES).toBe(1048576)

    await expect(
      transport.store(keys.one(), 0, 0, new Uint8Array(DEFAULT_MAX_ITEM_BYTES + 1)),
    ).rejects.toThrow("SERVER_ERROR object too large for cache")
  })

  it("rejects calls after close", async () => {
    await transport.store(keys.one(), 0, 0, bytes.a())
    await transport.close()
    await transport.close()

    await expect(transport.retrieve(keys.one())).rejects.toThrow("memory transport is closed")
    expect(transport.peek(keys.one())).toBeUndefined()
  })
})
