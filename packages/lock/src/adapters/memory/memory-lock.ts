import { assertValidTimeMs } from "../../core/validation/validation"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { AcquireOptions, LockConfig } from "../../ports/options"
import { MemoryLease } from "./memory-lock-lease"

export type MemoryLockConfig = LockConfig

type Waiter = {
  grant: (lease: MemoryLease) => void
}

type Slot = {
  holder: MemoryLease
  waiters: Waiter[]
}

/**
 * In-process keyed mutex. Waiters are served in arrival order: a release
 * hands the key directly to the oldest waiter, so a newcomer calling
 * `tryAcquire` cannot slip in between.
 */
export class MemoryLock implements Lock {
  private readonly slots = new Map<LockKey, Slot>()

  public constructor(private readonly config: MemoryLockConfig) {
    assertValidTimeMs(config.defaultTimeoutMs, "defaultTimeoutMs")
  }

  public async acquire(key: LockKey, opts: AcquireOptions = {}): Promise<LockLease | null> {
    if (opts.signal?.aborted) return null

    const immediate = this.take(key)
    if (immediate) return immediate

    const timeoutMs = opts.timeoutMs ?? this.config.defaultTimeoutMs
    assertValidTimeMs(timeoutMs, "acquire timeoutMs")

    if (timeoutMs === 0) return null

    return await this.enqueue(key, timeoutMs, opts.signal)
  }

  public async tryAcquire(key: LockKey): Promise<LockLease | null> {
    return this.take(key)
  }

  public isHeld(key: LockKey): boolean {
    return this.slots.has(key)
  }

  /** Number of keys currently held. */
  public get size(): number {
    return this.slots.size
  }

  private take(key: LockKey): MemoryLease | null {
    if (this.slots.has(key)) return null

    const lease = this.createLease(key)
    this.slots.set(key, { holder: lease, waiters: [] })

    return lease
  }

  private enqueue(
    key: LockKey,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<MemoryLease | null> {
    return new Promise((resolve) => {
      const slot = this.slots.get(key)
      if (!slot) {
        resolve(this.take(key))
        return
      }

      const settle = (lease: MemoryLease | null) => {
        clearTimeout(timer)
        signal?.removeEventListener("abort", onAbort)
        resolve(lease)
      }

      const waiter: Waiter = { grant: (lease) => settle(lease) }

      const giveUp = () => {
        const index = slot.waiters.indexOf(waiter)
        if (index >= 0) slot.waiters.splice(index, 1)
        settle(null)
      }

      const onAbort = () => giveUp()
      const timer = setTimeout(giveUp, timeoutMs)
      timer.unref?.()

      signal?.addEventListener("abort", onAbort, { once: true })
      slot.waiters.push(waiter)
    })
  }

  private createLease(key: LockKey): MemoryLease {
    return new MemoryLease(key, { onRelease: (lease) => this.handOff(lease) })
  }

  private handOff(released: MemoryLease): void {
    const slot = this.slots.get(released.key)
    if (!slot || slot.holder !== released) return

    const next = slot.waiters.shift()
    if (!next) {
      this.slots.delete(released.key)
      return
    }

    const lease = this.createLease(released.key)
    slot.holder = lease
    next.grant(lease)
  }
}
