import { resolveClientConfig } from "../../../core/client/client-config"
import { RecordingLogger } from "../../../tests/utils/recording-logger"
import { toMemjsOptions } from "../memjs-client"

describe("toMemjsOptions", () => {
  it("makes one attempt per operation", () => {
    const opts = toMemjsOptions(resolveClientConfig(["a:1"]), new RecordingLogger())

    expect(opts.retries).toBe(1)
  })

  it("leaves the connection timeout to memjs when dialTimeout is 0", () => {
    const opts = toMemjsOptions(resolveClientConfig(["a:1"]), new RecordingLogger())

    expect(opts).not.toHaveProperty("conntimeout")
  })

  it("converts dialTimeout to seconds", () => {
    const opts = toMemjsOptions(
      resolveClientConfig(["a:1"], { dialTimeout: 1500 }),
      new RecordingLogger(),
    )

    expect(opts.conntimeout).toBe(1.5)
  })

  it("forwards memjs log lines as warnings", () => {
    const logger = new RecordingLogger()
    const opts = toMemjsOptions(resolveClientConfig(["a:1"]), logger)

    opts.logger.log("MemJS:", "connection", 11211, "lost")

    expect(logger.entries).toEqual([
      { level: "warn", message: "MemJS: connection 11211 lost", meta: { module: "memjs" } },
    ])
  })
})
