import { mock } from "vitest-mock-extended"
import { bytes, keys } from "../../../tests/utils/client-test-helpers"
import type { Mock } from "../../../tests/utils/mock"
import type { MemjsBytesClient } from "../memjs-client"
import { MemjsTransport } from "../memjs-transport"

describe("MemjsTransport", () => {
  let client: Mock<MemjsBytesClient>
  let transport: MemjsTransport

  beforeEach(() => {
    client = mock<MemjsBytesClient>()
    transport = new MemjsTransport(client)
  })

  describe("store", () => {
    it("sets a Buffer over the payload with the ttl as expires", async () => {
      client.set.mockResolvedValue(true)

      await transport.store(keys.one(), 30, 0, bytes.a())

      expect(client.set).toHaveBeenCalledExactlyOnceWith(keys.one(), Buffer.from([1, 2, 3]), {
        expires: 30,
      })
      const [, value] = client.set.mock.calls[0] ?? []
      expect(Buffer.isBuffer(value)).toBe(true)
    })

    it("respects the payload's view into a larger buffer", async () => {
      const backing = new Uint8Array([9, 1, 2, 9])

      await transport.store(keys.one(), 0, 0, backing.subarray(1, 3))

      expect(client.set).toHaveBeenCalledExactlyOnceWith(keys.one(), Buffer.from([1, 2]), {
        expires: 0,
      })
    })

    it("refuses nonzero flags", async () => {
      await expect(transport.store(keys.one(), 0, 3, bytes.a())).rejects.toThrow(
        "memjs cannot store item flags (got 3)",
      )
      expect(client.set).not.toHaveBeenCalled()
    })

    it("propagates client errors", async () => {
      client.set.mockRejectedValue(new Error("connection refused"))

      await expect(transport.store(keys.one(), 0, 0, bytes.a())).rejects.toThrow(
        "connection refused",
      )
    })
  })

  describe("retrieve", () => {
    it("maps null to a miss", async () => {
      client.get.mockResolvedValue(null)

      await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({ kind: "miss" })
    })

    it("maps a null value to a miss", async () => {
      client.get.mockResolvedValue({ value: null, flags: null })

      await expect(transport.retrieve(keys.one())).resolves.toStrictEqual({ kind: "miss" })
    })

    it("copies a Buffer value into a plain Uint8Array", async () => {
      client.get.mockResolvedValue({ value: Buffer.from([4, 5]), flags: Buffer.alloc(4) })

      const res = await transport.retrieve(keys.one())

      expect(res).toStrictEqual({ kind: "hit", value: new Uint8Array([4, 5]) })
      if (res.kind === "hit") expect(Buffer.isBuffer(res.value)).toBe(false)
    })

    it("rejects shapes it does not understand", async () => {
      client.get.mockResolvedValue("surprise")
      await expect(transport.retrieve(keys.one())).rejects.toThrow(
        "Unexpected memjs get result: string",
      )

      client.get.mockResolvedValue({ value: 42 })
      await expect(transport.retrieve(keys.one())).rejects.toThrow(
        "Unexpected memjs value type: number",
      )
    })
  })

  describe("remove", () => {
    it("reports whether memjs deleted the key", async () => {
      client.delete.mockResolvedValueOnce(true).mockResolvedValueOnce(false)

      await expect(transport.remove(keys.one())).resolves.toBe(true)
      await expect(transport.remove(keys.one())).resolves.toBe(false)
    })
  })

  describe("close", () => {
    it("closes the memjs client once", async () => {
      await transport.close()
      await transport.close()

      expect(client.close).toHaveBeenCalledOnce()
    })
  })
})
