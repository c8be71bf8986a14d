import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"

export type MemoryLeaseDeps = {
  onRelease: (lease: MemoryLease) => void
}

export class MemoryLease implements LockLease {
  private released = false

  public constructor(
    public readonly key: LockKey,
    private readonly deps: MemoryLeaseDeps,
  ) {}

  public get isReleased(): boolean {
    return this.released
  }

  public async release(): Promise<void> {
    if (this.released) return

    this.released = true
    this.deps.onRelease(this)
  }
}
