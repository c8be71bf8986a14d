export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export {
  ClosedError,
  ConfigurationError,
  CorruptionError,
  InvalidKeyError,
  KeyNotFoundError,
  SerializationError,
  StorageError,
  type StorageErrorInput,
} from "./core/errors"
export { errorChain, findInChain } from "./core/utils/error-chain"
export { hasErrorCode, isAppError } from "./core/utils/is-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
