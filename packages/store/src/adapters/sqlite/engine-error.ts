import { BaseError, StorageError } from "@vellum/errors"

function engineCodeOf(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code
  }

  return undefined
}

export function isBusyCode(code: string | undefined): boolean {
  return code !== undefined && (code.startsWith("SQLITE_BUSY") || code.startsWith("SQLITE_LOCKED"))
}

/**
 * Library errors pass through; anything else thrown by the engine becomes a
 * `StorageError` carrying the SQLite result code.
 */
export function toStorageError(err: unknown, operation: string, path?: string): unknown {
  if (err instanceof BaseError) return err

  const engineCode = engineCodeOf(err)
  const detail = err instanceof Error ? err.message : String(err)

  return new StorageError(`SQLite ${operation} failed: ${detail}`, {
    operation,
    cause: err,
    isRetryable: isBusyCode(engineCode),
    ...(engineCode !== undefined && { engineCode }),
    ...(path !== undefined && { path }),
  })
}
