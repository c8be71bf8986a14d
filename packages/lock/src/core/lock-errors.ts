import { BaseError } from "@vellum/errors"
import type { LockKey } from "../ports/lock"

export type LockAcquisitionFailure = "timeout" | "aborted"

export class LockAcquisitionError extends BaseError<"lock_not_acquired"> {
  constructor(
    readonly key: LockKey,
    readonly reason: LockAcquisitionFailure,
  ) {
    super(
      reason === "timeout"
        ? `Timed out waiting for lock "${key}"`
        : `Aborted while waiting for lock "${key}"`,
      {
        code: "lock_not_acquired",
        context: { key, reason },
        isRetryable: reason === "timeout",
      },
    )
  }
}
