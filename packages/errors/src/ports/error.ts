export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (keys, paths, engine codes).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable code for programmatic handling. */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same call may succeed (busy database, lock timeout). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (missing key, unreadable entry, I/O),
   * `false` for programmer errors and invariant violations.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by `toJSON()` and log serializers.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
