/**
 * CacheKey is a plain string for ergonomics.
 *
 * @remarks
 * memcached limits keys to 250 bytes and forbids whitespace and control
 * characters. The client validates this before any network call, so
 * transports can assume well-formed keys.
 */
export type CacheKey = string
