import type { LockLease } from "./lock-lease"
import type { AcquireOptions } from "./options"

export type LockKey = string

/**
 * Mutual exclusion per key. Holders of different keys never wait on each other.
 */
export interface Lock {
  /**
   * Wait for `key` to become free and take it.
   *
   * @returns The lease, or `null` if the timeout elapsed or the signal was
   *          aborted first.
   */
  acquire(key: LockKey, opts?: AcquireOptions): Promise<LockLease | null>

  /**
   * Take `key` only if it is free right now.
   */
  tryAcquire(key: LockKey): Promise<LockLease | null>

  isHeld(key: LockKey): boolean
}
