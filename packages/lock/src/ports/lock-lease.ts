import type { LockKey } from "./lock"

export interface LockLease {
  readonly key: LockKey

  /**
   * Give the key to the next waiter, if any. Idempotent.
   */
  release(): Promise<void>
}
