export {
  CacheMissError,
  DecodingFailureError,
  EncodingFailureError,
  ErrorCodes,
  ExpirationNotValidError,
  KeyNotValidError,
  type MemcErrorCode,
  TransportFailureError,
} from "./errors"
export { isMemcError } from "./is-memc-error"
export {
  type ErrorCode,
  type ErrorContext,
  MemcError,
  type MemcErrorOptions,
  type SerializedError,
  type SerializeOptions,
  serializeError,
} from "./memc-error"
