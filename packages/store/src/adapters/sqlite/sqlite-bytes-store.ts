import { ClosedError } from "@vellum/errors"
import type { Lock } from "@vellum/lock"
import type { Logger } from "@vellum/logger"
import { NullLogger } from "@vellum/logger"
import type Database from "better-sqlite3"
import { paginate } from "../../core/paginate"
import { assertPositiveInteger } from "../../core/validate-options"
import { assertValidKey } from "../../core/validate-key"
import type { BytesStore, StoreKey, StoreUpdater } from "../../ports/bytes-store"
import { DEFAULT_PAGE_SIZE, type JournalMode } from "../../ports/options"
import { found, notFound, type StoreResult } from "../../ports/store-result"
import { toStorageError } from "./engine-error"
import {
  defaultSqliteHandlePool,
  type SqliteHandle,
  type SqliteHandlePool,
} from "./sqlite-handle-pool"

export type SqliteBytesStoreOptions = {
  /** Database file, or `:memory:` for a private in-memory database. */
  path: string
  busyTimeoutMs?: number
  journalMode?: JournalMode
  pageSize?: number
}

export type SqliteBytesStoreDeps = {
  pool?: SqliteHandlePool
  logger?: Logger
}

type ValueRow = { value: Buffer }
type KeyRow = { key: string }
type EntryRow = { key: string; value: Buffer }

type Statements = {
  get: Database.Statement<[string], ValueRow>
  has: Database.Statement<[string], { present: number }>
  put: Database.Statement<[string, Buffer]>
  delete: Database.Statement<[string]>
  count: Database.Statement<[], { n: number }>
  clear: Database.Statement<[]>
  firstKeys: Database.Statement<[number], KeyRow>
  nextKeys: Database.Statement<[string, number], KeyRow>
  firstEntries: Database.Statement<[number], EntryRow>
  nextEntries: Database.Statement<[string, number], EntryRow>
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
}

/**
 * `BytesStore` over a single `entries` table.
 *
 * Every call is one synchronous engine statement, so it cannot interleave with
 * another caller; `update` wraps its read and write in an IMMEDIATE
 * transaction. Returned bytes are copies detached from the engine's buffers.
 */
export class SqliteBytesStore implements BytesStore {
  private readonly handle: SqliteHandle
  private readonly statements: Statements
  private readonly pageSize: number
  private readonly logger: Logger
  private isClosed = false

  public constructor(opts: SqliteBytesStoreOptions, deps: SqliteBytesStoreDeps = {}) {
    this.pageSize = opts.pageSize ?? DEFAULT_PAGE_SIZE
    assertPositiveInteger(this.pageSize, "pageSize")

    this.handle = (deps.pool ?? defaultSqliteHandlePool).acquire(opts.path, {
      ...(opts.busyTimeoutMs !== undefined && { busyTimeoutMs: opts.busyTimeoutMs }),
      ...(opts.journalMode !== undefined && { journalMode: opts.journalMode }),
    })
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "sqlite-bytes-store",
      path: this.handle.path,
    })

    try {
      this.statements = this.prepare()
    } catch (err) {
      this.handle.release()
      throw toStorageError(err, "open", this.handle.path)
    }
  }

  get guard(): Lock {
    return this.handle.guard
  }

  get closed(): boolean {
    return this.isClosed
  }

  get path(): string {
    return this.handle.path
  }

  async get(key: StoreKey): Promise<StoreResult> {
    assertValidKey(key)

    return this.run("get", () => this.read(key))
  }

  async put(key: StoreKey, value: Uint8Array): Promise<void> {
    assertValidKey(key)

    this.run("put", () => {
      this.statements.put.run(key, toBuffer(value))
    })
  }

  async delete(key: StoreKey): Promise<void> {
    assertValidKey(key)

    this.run("delete", () => {
      this.statements.delete.run(key)
    })
  }

  async has(key: StoreKey): Promise<boolean> {
    assertValidKey(key)

    return this.run("has", () => this.statements.has.get(key) !== undefined)
  }

  async update(key: StoreKey, fn: StoreUpdater): Promise<void> {
    assertValidKey(key)

    this.run("update", () => {
      const tx = this.handle.db.transaction((k: string) => {
        const next = fn(this.read(k))
        if (next !== undefined) this.statements.put.run(k, toBuffer(next))
      })

      tx.immediate(key)
    })
  }

  async *keys(): AsyncIterableIterator<StoreKey> {
    const rows = paginate(this.pageSize, (after, limit) =>
      this.run("keys", () =>
        after === undefined
          ? this.statements.firstKeys.all(limit)
          : this.statements.nextKeys.all(after, limit),
      ),
    )

    for await (const row of rows) {
      yield row.key
    }
  }

  async *entries(): AsyncIterableIterator<[StoreKey, Uint8Array]> {
    const rows = paginate(this.pageSize, (after, limit) =>
      this.run("entries", () =>
        after === undefined
          ? this.statements.firstEntries.all(limit)
          : this.statements.nextEntries.all(after, limit),
      ),
    )

    for await (const row of rows) {
      yield [row.key, new Uint8Array(row.value)]
    }
  }

  async count(): Promise<number> {
    return this.run("count", () => this.statements.count.get()?.n ?? 0)
  }

  async clear(): Promise<void> {
    this.run("clear", () => {
      this.statements.clear.run()
    })
  }

  async close(): Promise<void> {
    if (this.isClosed) return

    this.isClosed = true
    this.logger.debug("Handle released", { operation: "close" })
    this.handle.release()
  }

  private read(key: string): StoreResult {
    const row = this.statements.get.get(key)

    return row ? found(new Uint8Array(row.value)) : notFound
  }

  private run<T>(operation: string, fn: () => T): T {
    if (this.isClosed) throw new ClosedError("store", operation)

    try {
      return fn()
    } catch (err) {
      throw toStorageError(err, operation, this.handle.path)
    }
  }

  private prepare(): Statements {
    const { db } = this.handle

    return {
      get: db.prepare<[string], ValueRow>("SELECT value FROM entries WHERE key = ?"),
      has: db.prepare<[string], { present: number }>(
        "SELECT 1 AS present FROM entries WHERE key = ?",
      ),
      put: db.prepare<[string, Buffer]>(
        "INSERT INTO entries (key, value) VALUES (?, ?) " +
          "ON CONFLICT(key) DO UPDATE SET value = excluded.value",
      ),
      delete: db.prepare<[string]>("DELETE FROM entries WHERE key = ?"),
      count: db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM entries"),
      clear: db.prepare<[]>("DELETE FROM entries"),
      firstKeys: db.prepare<[number], KeyRow>("SELECT key FROM entries ORDER BY key LIMIT ?"),
      nextKeys: db.prepare<[string, number], KeyRow>(
        "SELECT key FROM entries WHERE key > ? ORDER BY key LIMIT ?",
      ),
      firstEntries: db.prepare<[number], EntryRow>(
        "SELECT key, value FROM entries ORDER BY key LIMIT ?",
      ),
      nextEntries: db.prepare<[string, number], EntryRow>(
        "SELECT key, value FROM entries WHERE key > ? ORDER BY key LIMIT ?",
      ),
    }
  }
}
