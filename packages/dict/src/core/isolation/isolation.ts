import type { StoreKey, StoreUpdater } from "@vellum/store"

export type IsolationMode = "serialized" | "engine"

/**
 * How a dictionary keeps operations on one key from interleaving.
 */
export interface Isolation {
  readonly mode: IsolationMode

  /** Run a single-step operation on `key`. */
  run<T>(key: StoreKey, operation: string, fn: () => Promise<T>): Promise<T>

  /** Read-modify-write `key` as one atomic step. */
  modify(key: StoreKey, operation: string, fn: StoreUpdater): Promise<void>
}
