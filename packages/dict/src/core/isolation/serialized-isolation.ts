import { StorageError } from "@vellum/errors"
import { LockAcquisitionError, withLock } from "@vellum/lock"
import type { Logger } from "@vellum/logger"
import type { BytesStore, StoreKey, StoreUpdater } from "@vellum/store"
import type { Isolation } from "./isolation"

export type SerializedIsolationOptions = {
  lockTimeoutMs: number
}

export type SerializedIsolationDeps = {
  store: BytesStore
  logger: Logger
}

/**
 * Every operation on a key holds that key in the store's guard. A
 * read-modify-write also runs as one `BytesStore.update`, so writers that skip
 * the guard on the same store cannot land between its read and its write.
 * Distinct keys never wait on each other.
 */
export class SerializedIsolation implements Isolation {
  readonly mode = "serialized"

  public constructor(
    private readonly deps: SerializedIsolationDeps,
    private readonly opts: SerializedIsolationOptions,
  ) {}

  async run<T>(key: StoreKey, operation: string, fn: () => Promise<T>): Promise<T> {
    return this.locked(key, operation, fn)
  }

  async modify(key: StoreKey, operation: string, fn: StoreUpdater): Promise<void> {
    await this.locked(key, operation, () => this.deps.store.update(key, fn))
  }

  private async locked<T>(key: StoreKey, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withLock(this.deps.store.guard, key, fn, { timeoutMs: this.opts.lockTimeoutMs })
    } catch (err) {
      if (!(err instanceof LockAcquisitionError)) throw err

      this.deps.logger.warn("Timed out waiting for key lock", { key, operation, err })

      throw new StorageError(
        `Timed out after ${this.opts.lockTimeoutMs}ms waiting for key "${key}"`,
        { operation, cause: err, isRetryable: true },
      )
    }
  }
}
