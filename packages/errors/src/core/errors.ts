import { BaseError } from "./base-error"

export class KeyNotFoundError extends BaseError<"key_not_found"> {
  constructor(readonly key: string) {
    super(`Key "${key}" does not exist`, {
      code: "key_not_found",
      context: { key },
    })
  }
}

export class InvalidKeyError extends BaseError<"invalid_key"> {
  constructor(received: unknown) {
    super("Keys must be non-empty strings", {
      code: "invalid_key",
      context: { receivedType: typeof received },
    })
  }
}

/**
 * A value could not be turned into bytes, or decoded bytes do not describe a
 * valid value.
 */
export class SerializationError extends BaseError<"serialization_failed"> {
  static unsupported(path: string, reason: string): SerializationError {
    return new SerializationError(`Cannot serialize value at ${path}: ${reason}`, {
      path,
    })
  }

  static malformed(reason: string, cause?: unknown): SerializationError {
    return new SerializationError(`Stored bytes are not a valid value: ${reason}`, {}, cause)
  }

  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, {
      code: "serialization_failed",
      context,
      ...(cause !== undefined && { cause }),
    })
  }
}

/**
 * Stored bytes cannot be unframed or decompressed.
 */
export class CorruptionError extends BaseError<"corrupted_entry"> {
  constructor(reason: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(`Stored entry is corrupted: ${reason}`, {
      code: "corrupted_entry",
      context,
      ...(cause !== undefined && { cause }),
    })
  }
}

export type StorageErrorInput = {
  operation: string
  cause?: unknown
  engineCode?: string
  path?: string
  isRetryable?: boolean
}

export class StorageError extends BaseError<"storage_failure"> {
  constructor(message: string, input: StorageErrorInput) {
    super(message, {
      code: "storage_failure",
      context: {
        operation: input.operation,
        ...(input.engineCode !== undefined && { engineCode: input.engineCode }),
        ...(input.path !== undefined && { path: input.path }),
      },
      ...(input.cause !== undefined && { cause: input.cause }),
      isRetryable: input.isRetryable ?? false,
    })
  }
}

export class ClosedError extends BaseError<"closed"> {
  constructor(resource: string, operation: string) {
    super(`Cannot ${operation}: ${resource} is closed`, {
      code: "closed",
      context: { resource, operation },
      isOperational: false,
    })
  }
}

export class ConfigurationError extends BaseError<"invalid_configuration"> {
  constructor(details: string) {
    super(`Invalid configuration:\n${details}`, {
      code: "invalid_configuration",
      isOperational: false,
    })
  }
}
