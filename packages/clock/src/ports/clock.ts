import type { Milliseconds } from "./time"

/**
 * Source of wall-clock time for entry timestamps.
 */
export interface Clock {
  /** Current time as a Date. Prefer `nowMs()` for arithmetic. */
  now(): Date

  /** Current time as milliseconds since the Unix epoch. */
  nowMs(): Milliseconds
}
