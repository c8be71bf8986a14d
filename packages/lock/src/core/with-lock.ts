import type { Lock, LockKey } from "../ports/lock"
import type { AcquireOptions } from "../ports/options"
import { LockAcquisitionError } from "./lock-errors"

export async function tryWithLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
): Promise<T | null> {
  const lease = await lock.tryAcquire(key)

  if (!lease) {
    return null
  }

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}

/**
 * Run `fn` while holding `key`; the lease is released however `fn` exits.
 *
 * @throws LockAcquisitionError when the wait times out or is aborted.
 */
export async function withLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
  opts: AcquireOptions = {},
): Promise<T> {
  if (opts.signal?.aborted) {
    throw new LockAcquisitionError(key, "aborted")
  }

  const lease = await lock.acquire(key, opts)
  if (!lease) {
    throw new LockAcquisitionError(key, opts.signal?.aborted ? "aborted" : "timeout")
  }

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}
