import type { Milliseconds } from "@vellum/clock"

export type AcquireOptions = {
  /** Max time to wait. Falls back to `LockConfig.defaultTimeoutMs` if omitted. */
  timeoutMs?: Milliseconds

  /** Aborts the wait early. Has no effect once the lock is held. */
  signal?: AbortSignal
}

export type LockConfig = {
  /** Default wait for `acquire()` when `timeoutMs` is omitted. */
  defaultTimeoutMs: Milliseconds
}
