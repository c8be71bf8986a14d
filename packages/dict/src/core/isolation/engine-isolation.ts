import type { BytesStore, StoreKey, StoreUpdater } from "@vellum/store"
import type { Isolation } from "./isolation"

/**
 * Leaves atomicity to the store: single statements run as-is and
 * read-modify-writes go through `BytesStore.update`, one engine transaction
 * each.
 */
export class EngineIsolation implements Isolation {
  readonly mode = "engine"

  public constructor(private readonly store: BytesStore) {}

  async run<T>(_key: StoreKey, _operation: string, fn: () => Promise<T>): Promise<T> {
    return fn()
  }

  async modify(key: StoreKey, _operation: string, fn: StoreUpdater): Promise<void> {
    await this.store.update(key, fn)
  }
}
