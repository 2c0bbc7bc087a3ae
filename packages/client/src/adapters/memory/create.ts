import { createNullLogger, type Logger } from "@memc/logger"
import { resolveClientConfig } from "../../core/client/client-config"
import { MemcClient } from "../../core/client/memc-client"
import type { ClientOptions } from "../../ports/client-options"
import type { TimeSource } from "../../ports/clock"
import { MemoryTransport, type MemoryTransportOptions } from "./memory-transport"

export type MemoryClientDeps = {
  clock: TimeSource
  logger: Logger
}

/**
 * Create a client backed by an in-process {@link MemoryTransport}, for
 * tests and local development.
 */
export function createMemoryClient(
  options: Partial<ClientOptions & MemoryTransportOptions> = {},
  deps: Partial<MemoryClientDeps> = {},
): { client: MemcClient; transport: MemoryTransport } {
  const config = resolveClientConfig([], options)
  const transport = new MemoryTransport(
    deps.clock ? { clock: deps.clock } : {},
    options.maxItemBytes !== undefined ? { maxItemBytes: options.maxItemBytes } : {},
  )

  return {
    client: new MemcClient(config, transport, deps.logger ?? createNullLogger()),
    transport,
  }
}
