export { MemoryLock, type MemoryLockConfig } from "./adapters/memory/memory-lock"
export { type LockAcquisitionFailure, LockAcquisitionError } from "./core/lock-errors"
export { tryWithLock, withLock } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
export type { AcquireOptions, LockConfig } from "./ports/options"
