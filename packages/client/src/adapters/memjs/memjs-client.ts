import type { Logger } from "@memc/logger"
import { Client } from "memjs"
import type { ClientConfig } from "../../ports/client-options"

/**
 * The slice of the memjs client the transport relies on.
 *
 * @remarks
 * Results are typed `unknown` and narrowed by the transport, which keeps
 * the adapter independent of the response shapes memjs releases declare.
 */
export type MemjsBytesClient = {
  get(key: string): Promise<unknown>
  set(key: string, value: Buffer, options: { expires: number }): Promise<unknown>
  delete(key: string): Promise<unknown>
  close(): void
}

export type MemjsClientOptions = {
  /** Attempts per operation; `1` disables memjs' own retry loop. */
  retries: number

  /** Connection timeout in seconds. */
  conntimeout?: number

  logger: { log: (...args: unknown[]) => void }
}

export function toMemjsOptions(config: ClientConfig, logger: Logger): MemjsClientOptions {
  return {
    retries: 1,
    ...(config.dialTimeout > 0 && { conntimeout: config.dialTimeout / 1000 }),
    logger: {
      log: (...args: unknown[]) => logger.warn(args.map(String).join(" "), { module: "memjs" }),
    },
  }
}

/**
 * Create a memjs client for `config.servers`.
 *
 * No socket is opened until the first operation. An empty server list
 * falls back to memjs' own default (`MEMCACHIER_SERVERS` or
 * `localhost:11211`).
 */
export function createMemjsBytesClient(config: ClientConfig, logger: Logger): MemjsBytesClient {
  const options = toMemjsOptions(config, logger)

  return Client.create(config.servers.join(","), options)
}
