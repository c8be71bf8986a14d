import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Manually driven clock for tests.
 */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }
}
