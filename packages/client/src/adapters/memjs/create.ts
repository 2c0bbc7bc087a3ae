import { createNullLogger, type Logger } from "@memc/logger"
import { resolveClientConfig } from "../../core/client/client-config"
import { MemcClient } from "../../core/client/memc-client"
import type { ClientOptions } from "../../ports/client-options"
import { createMemjsBytesClient } from "./memjs-client"
import { MemjsTransport } from "./memjs-transport"

export type CreateClientDeps = {
  logger: Logger
}

/**
 * Create a client for one or more `host:port` memcached endpoints.
 *
 * @example
 * ```ts
 * const client = createClient(["cache-1:11211", "cache-2:11211"], {
 *   dialTimeout: 2_000,
 *   defaultTtl: 60_000,
 * })
 *
 * await client.set("greeting", "hello", codecs.text)
 * await client.close()
 * ```
 */
export function createClient(
  servers: readonly string[],
  options: Partial<ClientOptions> = {},
  deps: Partial<CreateClientDeps> = {},
): MemcClient {
  const config = resolveClientConfig(servers, options)
  const logger = deps.logger ?? createNullLogger()
  const transport = new MemjsTransport(createMemjsBytesClient(config, logger))

  return new MemcClient(config, transport, logger)
}
