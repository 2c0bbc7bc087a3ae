import type { Milliseconds } from "./time"

export type ClientOptions = {
  /**
   * Connection establishment timeout handed to the transport.
   *
   * Default: `0`, the transport's own default.
   */
  dialTimeout: Milliseconds

  /**
   * Expiration applied by `set` when the call gives no `ttl`. Must be whole
   * seconds.
   *
   * Default: `0`, no expiration.
   */
  defaultTtl: Milliseconds
}

export type SetOptions = {
  /**
   * Expiration for this write only, replacing the client's `defaultTtl`.
   * Must be whole seconds; `0` means no expiration.
   */
  ttl: Milliseconds
}

/**
 * Resolved, frozen configuration of a client instance.
 */
export type ClientConfig = Readonly<
  ClientOptions & {
    servers: readonly string[]
  }
>
