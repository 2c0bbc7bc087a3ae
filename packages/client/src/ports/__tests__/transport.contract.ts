import { beforeEach, describe, expect, it } from "vitest"
import { bytes, keys } from "../../tests/utils/client-test-helpers"
import type { MemcacheTransport } from "../transport"

type CreateTransport = () => MemcacheTransport

export function describeTransportContract(
  adapterName: string,
  createTransport: CreateTransport,
): void {
  describe(`MemcacheTransport contract - ${adapterName}`, () => {
    let transport: MemcacheTransport

    beforeEach(() => {
      transport = createTransport()
    })

    describe("store/retrieve", () => {
      it("misses an absent key", async () => {
        await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({ kind: "miss" })
      })

      it("returns the stored bytes byte-for-byte", async () => {
        await transport.store(keys.one(), 0, 0, bytes.a())

        await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({
          kind: "hit",
          value: bytes.a(),
        })
      })

      it("keeps an empty payload as a hit", async () => {
        await transport.store(keys.one(), 0, 0, bytes.empty())

        await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({
          kind: "hit",
          value: bytes.empty(),
        })
      })

      it("stores only the bytes a view covers", async () => {
        const backing = new Uint8Array([9, 1, 2, 3, 9])

        await transport.store(keys.one(), 0, 0, backing.subarray(1, 4))

        await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({
          kind: "hit",
          value: bytes.a(),
        })
      })

      it("overwrites an existing key", async () => {
        await transport.store(keys.one(), 0, 0, bytes.a())
        await transport.store(keys.one(), 0, 0, bytes.b())

        await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({
          kind: "hit",
          value: bytes.b(),
        })
      })

      it("keeps keys independent", async () => {
        await transport.store(keys.one(), 0, 0, bytes.a())
        await transport.store(keys.two(), 0, 0, bytes.b())

        await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({
          kind: "hit",
          value: bytes.a(),
        })
        await expect(transport.retrieve(keys.three())).resolves.toStrictEqual({ kind: "miss" })
      })

      it("is not affected by later changes to the input", async () => {
        const input = bytes.a()

        await transport.store(keys.one(), 0, 0, input)
        input[0] = 42

        await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({
          kind: "hit",
          value: bytes.a(),
        })
      })

      it("hands out results callers may change freely", async () => {
        await transport.store(keys.one(), 0, 0, bytes.a())

        const first = await transport.retrieve(keys.one())
        if (first.kind === "hit") first.value.fill(0)

        await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({
          kind: "hit",
          value: bytes.a(),
        })
      })
    })

    describe("remove", () => {
      it("returns true and forgets a stored key", async () => {
        await transport.store(keys.one(), 0, 0, bytes.a())

        await expect(transport.remove(keys.one())).resolves.toBe(true)
        await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({ kind: "miss" })
      })

      it("returns false for an absent key", async () => {
        await expect(transport.remove(keys.one())).resolves.toBe(false)
      })

      it("leaves other keys alone", async () => {
        await transport.store(keys.one(), 0, 0, bytes.a())
        await transport.store(keys.two(), 0, 0, bytes.b())

        await transport.remove(keys.one())

        await expect(transport.retrieve(keys.two())).resolves.toStrictEqual({
          kind: "hit",
          value: bytes.b(),
        })
      })
    })

    describe("close", () => {
      it("can be called more than once", async () => {
        await transport.close()

        await expect(transport.close()).resolves.toBeUndefined()
      })
    })
  })
}
