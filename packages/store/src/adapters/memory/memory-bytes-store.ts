import { ClosedError } from "@vellum/errors"
import type { Lock } from "@vellum/lock"
import { MemoryLock } from "@vellum/lock"
import { paginate } from "../../core/paginate"
import { assertValidKey } from "../../core/validate-key"
import { assertPositiveInteger } from "../../core/validate-options"
import type { BytesStore, StoreKey, StoreUpdater } from "../../ports/bytes-store"
import { DEFAULT_GUARD_TIMEOUT_MS, DEFAULT_PAGE_SIZE } from "../../ports/options"
import { found, notFound, type StoreResult } from "../../ports/store-result"

export type MemoryBytesStoreOptions = {
  pageSize?: number
}

export type MemoryBytesStoreDeps = {
  guard?: Lock
}

type Row = { key: string; value: Uint8Array }

/**
 * Process-local `BytesStore` backed by a `Map`. Values are copied on the way
 * in and out, so callers never share buffers with the store.
 */
export class MemoryBytesStore implements BytesStore {
  readonly guard: Lock

  private readonly store = new Map<StoreKey, Uint8Array>()
  private readonly pageSize: number
  private isClosed = false

  public constructor(opts: MemoryBytesStoreOptions = {}, deps: MemoryBytesStoreDeps = {}) {
    this.pageSize = opts.pageSize ?? DEFAULT_PAGE_SIZE
    assertPositiveInteger(this.pageSize, "pageSize")

    this.guard = deps.guard ?? new MemoryLock({ defaultTimeoutMs: DEFAULT_GUARD_TIMEOUT_MS })
  }

  get closed(): boolean {
    return this.isClosed
  }

  async get(key: StoreKey): Promise<StoreResult> {
    assertValidKey(key)
    this.assertOpen("get")

    return this.read(key)
  }

  async put(key: StoreKey, value: Uint8Array): Promise<void> {
    assertValidKey(key)
    this.assertOpen("put")

    this.store.set(key, new Uint8Array(value))
  }

  async delete(key: StoreKey): Promise<void> {
    assertValidKey(key)
    this.assertOpen("delete")

    this.store.delete(key)
  }

  async has(key: StoreKey): Promise<boolean> {
    assertValidKey(key)
    this.assertOpen("has")

    return this.store.has(key)
  }

  async update(key: StoreKey, fn: StoreUpdater): Promise<void> {
    assertValidKey(key)
    this.assertOpen("update")

    const next = fn(this.read(key))

    if (next !== undefined) this.store.set(key, new Uint8Array(next))
  }

  async *keys(): AsyncIterableIterator<StoreKey> {
    for await (const row of paginate(this.pageSize, (after, limit) =>
      this.page("keys", after, limit),
    )) {
      yield row.key
    }
  }

  async *entries(): AsyncIterableIterator<[StoreKey, Uint8Array]> {
    for await (const row of paginate(this.pageSize, (after, limit) =>
      this.page("entries", after, limit),
    )) {
      yield [row.key, new Uint8Array(row.value)]
    }
  }

  async count(): Promise<number> {
    this.assertOpen("count")

    return this.store.size
  }

  async clear(): Promise<void> {
    this.assertOpen("clear")

    this.store.clear()
  }

  async close(): Promise<void> {
    this.isClosed = true
  }

  private read(key: StoreKey): StoreResult {
    const value = this.store.get(key)

    return value ? found(new Uint8Array(value)) : notFound
  }

  private page(operation: string, after: string | undefined, limit: number): Row[] {
    this.assertOpen(operation)

    const rows: Row[] = []
    const sorted = [...this.store.keys()].sort()

    for (const key of sorted) {
      if (after !== undefined && key <= after) continue

      const value = this.store.get(key)
      if (value) rows.push({ key, value })
      if (rows.length === limit) break
    }

    return rows
  }

  private assertOpen(operation: string): void {
    if (this.isClosed) throw new ClosedError("store", operation)
  }
}
