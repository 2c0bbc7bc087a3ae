import { type ErrorContext, MemcError } from "./memc-error"

export const ErrorCodes = {
  KeyNotValid: "key_not_valid",
  ExpirationNotValid: "expiration_not_valid",
  EncodingFailure: "encoding_failure",
  DecodingFailure: "decoding_failure",
  CacheMiss: "cache_miss",
  TransportFailure: "transport_failure",
} as const

export type MemcErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

type Details = Readonly<{ context?: ErrorContext; cause?: unknown }>

/** Key is empty, longer than 250 bytes, or holds whitespace/control characters. */
export class KeyNotValidError extends MemcError<typeof ErrorCodes.KeyNotValid> {
  constructor(message: string, details: Details = {}) {
    super(message, { code: ErrorCodes.KeyNotValid, ...details })
  }
}

/** Duration cannot be expressed as whole seconds. */
export class ExpirationNotValidError extends MemcError<
  typeof ErrorCodes.ExpirationNotValid
> {
  constructor(message: string, details: Details = {}) {
    super(message, { code: ErrorCodes.ExpirationNotValid, ...details })
  }
}

export class EncodingFailureError extends MemcError<typeof ErrorCodes.EncodingFailure> {
  constructor(message: string, details: Details = {}) {
    super(message, { code: ErrorCodes.EncodingFailure, ...details })
  }
}

export class DecodingFailureError extends MemcError<typeof ErrorCodes.DecodingFailure> {
  constructor(message: string, details: Details = {}) {
    super(message, { code: ErrorCodes.DecodingFailure, ...details })
  }
}

/**
 * The key is absent on the server.
 *
 * @remarks
 * `get()` reports a miss as a result, not an error. Only `getOrThrow()`
 * raises this.
 */
export class CacheMissError extends MemcError<typeof ErrorCodes.CacheMiss> {
  constructor(key: string) {
    super(`No entry for key "${key}"`, { code: ErrorCodes.CacheMiss, context: { key } })
  }
}

export class TransportFailureError extends MemcError<typeof ErrorCodes.TransportFailure> {
  constructor(message: string, details: Details = {}) {
    super(message, { code: ErrorCodes.TransportFailure, isRetryable: true, ...details })
  }
}
