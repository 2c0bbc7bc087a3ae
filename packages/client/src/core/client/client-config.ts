import type { ClientConfig, ClientOptions } from "../../ports/client-options"

export const defaultClientOptions: ClientOptions = {
  dialTimeout: 0,
  defaultTtl: 0,
}

/**
 * Merge options over the defaults and freeze the result.
 *
 * @throws RangeError if `dialTimeout` is negative or not finite.
 */
export function resolveClientConfig(
  servers: readonly string[],
  options: Partial<ClientOptions> = {},
): ClientConfig {
  const dialTimeout = options.dialTimeout ?? defaultClientOptions.dialTimeout
  const defaultTtl = options.defaultTtl ?? defaultClientOptions.defaultTtl

  if (!Number.isFinite(dialTimeout) || dialTimeout < 0) {
    throw new RangeError(`dialTimeout must be a non-negative number of ms, got ${dialTimeout}`)
  }

  return Object.freeze({
    servers: Object.freeze([...servers]),
    dialTimeout,
    defaultTtl,
  })
}
