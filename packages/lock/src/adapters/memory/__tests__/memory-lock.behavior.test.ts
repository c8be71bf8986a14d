import { ConfigurationError } from "@vellum/errors"
import { MemoryLock } from "../memory-lock"

describe("MemoryLock behavior", () => {
  it("grants waiters in arrival order", async () => {
    const lock = new MemoryLock({ defaultTimeoutMs: 1_000 })
    const order: string[] = []

    const holder = await lock.acquire("k")

    const waiters = ["a", "b", "c"].map(async (name) => {
      const lease = await lock.acquire("k")
      order.push(name)
      await lease?.release()
    })

    await holder?.release()
    await Promise.all(waiters)

    expect(order).toEqual(["a", "b", "c"])
    expect(lock.size).toBe(0)
  })

  it("hands off directly so tryAcquire cannot jump the queue", async () => {
    const lock = new MemoryLock({ defaultTimeoutMs: 1_000 })

    const holder = await lock.acquire("k")
    const waiting = lock.acquire("k")

    await holder?.release()

    await expect(lock.tryAcquire("k")).resolves.toBeNull()

    const lease = await waiting
    await lease?.release()

    expect(lock.isHeld("k")).toBe(false)
  })

  it("a timed-out waiter is skipped on release", async () => {
    const lock = new MemoryLock({ defaultTimeoutMs: 1_000 })

    const holder = await lock.acquire("k")
    const gaveUp = lock.acquire("k", { timeoutMs: 10 })
    const patient = lock.acquire("k", { timeoutMs: 1_000 })

    await expect(gaveUp).resolves.toBeNull()

    await holder?.release()

    const lease = await patient
    expect(lease).not.toBeNull()
    await lease?.release()
  })

  it("stops waiting when the signal aborts", async () => {
    const lock = new MemoryLock({ defaultTimeoutMs: 5_000 })
    const ac = new AbortController()

    const holder = await lock.acquire("k")
    const waiting = lock.acquire("k", { signal: ac.signal })

    ac.abort()

    await expect(waiting).resolves.toBeNull()
    await holder?.release()
    expect(lock.isHeld("k")).toBe(false)
  })

  it("timeoutMs 0 never waits", async () => {
    const lock = new MemoryLock({ defaultTimeoutMs: 5_000 })

    const holder = await lock.acquire("k")

    await expect(lock.acquire("k", { timeoutMs: 0 })).resolves.toBeNull()
    await holder?.release()
  })

  it("rejects an invalid default timeout", () => {
    expect(() => new MemoryLock({ defaultTimeoutMs: -1 })).toThrow(ConfigurationError)
  })

  it("wait timers do not keep the process alive", async () => {
    const unref = vi.fn()
    const lock = new MemoryLock({ defaultTimeoutMs: 5_000 })
    const holder = await lock.acquire("k")

    const spy = vi
      .spyOn(globalThis, "setTimeout")
      .mockReturnValueOnce({ unref } as any)

    const waiting = lock.acquire("k")

    expect(spy).toHaveBeenCalledTimes(1)
    expect(unref).toHaveBeenCalledTimes(1)

    await holder?.release()
    const lease = await waiting
    await lease?.release()
  })
})
