import type { Lock } from "@vellum/lock"
import type { StoreResult } from "./store-result"

export type StoreKey = string

/**
 * Computes the next stored bytes from the current ones inside
 * {@link BytesStore.update}. Returning `undefined` skips the write; throwing
 * aborts the update. Either way the entry is left untouched.
 */
export type StoreUpdater = (current: StoreResult) => Uint8Array | undefined

/**
 * Durable map of string keys to opaque bytes.
 *
 * Implementations validate keys (`InvalidKeyError`), surface engine failures
 * as `StorageError`, and reject every operation after `close()` with
 * `ClosedError`. A missing key is never an error.
 */
export interface BytesStore {
  /**
   * Keyed mutex shared by every store that uses the same underlying handle,
   * so callers on different stores over one file still exclude each other.
   */
  readonly guard: Lock

  readonly closed: boolean

  get(key: StoreKey): Promise<StoreResult>

  put(key: StoreKey, value: Uint8Array): Promise<void>

  /** Idempotent. */
  delete(key: StoreKey): Promise<void>

  has(key: StoreKey): Promise<boolean>

  /**
   * Read, transform and write `key` atomically with respect to every other
   * writer of the same store.
   */
  update(key: StoreKey, fn: StoreUpdater): Promise<void>

  /**
   * Keys in ascending order. Pages are read lazily, so writes made while
   * iterating may or may not be observed, but iteration never fails because
   * of them.
   */
  keys(): AsyncIterableIterator<StoreKey>

  entries(): AsyncIterableIterator<[StoreKey, Uint8Array]>

  count(): Promise<number>

  clear(): Promise<void>

  /** Idempotent. */
  close(): Promise<void>
}
