import { resolve } from "node:path"
import type { Lock } from "@vellum/lock"
import { MemoryLock } from "@vellum/lock"
import type { Logger } from "@vellum/logger"
import { NullLogger } from "@vellum/logger"
import Database from "better-sqlite3"
import {
  DEFAULT_BUSY_TIMEOUT_MS,
  DEFAULT_GUARD_TIMEOUT_MS,
  DEFAULT_JOURNAL_MODE,
  type JournalMode,
} from "../../ports/options"
import { toStorageError } from "./engine-error"
import { applyPragmas, initSchema } from "./schema"

export const MEMORY_PATH = ":memory:"

export type SqliteOpenOptions = {
  busyTimeoutMs?: number
  journalMode?: JournalMode
}

/**
 * A counted reference to a pooled connection. `release()` is idempotent; the
 * connection closes when the last reference is released.
 */
export interface SqliteHandle {
  readonly db: Database.Database
  readonly guard: Lock
  readonly path: string
  release(): void
}

type PoolEntry = {
  db: Database.Database
  guard: Lock
  path: string
  refs: number
}

export type SqliteHandlePoolDeps = {
  logger?: Logger
}

/**
 * One connection and one guard per resolved file path. `:memory:` databases
 * are private to each caller and never shared.
 */
export class SqliteHandlePool {
  private readonly shared = new Map<string, PoolEntry>()
  private readonly logger: Logger

  public constructor(deps: SqliteHandlePoolDeps = {}) {
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "sqlite-handle-pool" })
  }

  /** Number of distinct file paths with live references. */
  get size(): number {
    return this.shared.size
  }

  acquire(path: string, opts: SqliteOpenOptions = {}): SqliteHandle {
    if (path === MEMORY_PATH) {
      return this.handleFor({ ...this.open(MEMORY_PATH, opts), refs: 1 }, false)
    }

    const resolved = resolve(path)
    const existing = this.shared.get(resolved)

    if (existing) {
      existing.refs++
      return this.handleFor(existing, true)
    }

    const entry: PoolEntry = { ...this.open(resolved, opts), refs: 1 }
    this.shared.set(resolved, entry)

    return this.handleFor(entry, true)
  }

  private open(path: string, opts: SqliteOpenOptions): Omit<PoolEntry, "refs"> {
    const busyTimeoutMs = opts.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS
    const journalMode = opts.journalMode ?? DEFAULT_JOURNAL_MODE

    let db: Database.Database
    try {
      db = new Database(path, { timeout: busyTimeoutMs })
    } catch (err) {
      throw toStorageError(err, "open", path)
    }

    try {
      applyPragmas(db, { journalMode, busyTimeoutMs })
      initSchema(db, path)
    } catch (err) {
      db.close()
      throw toStorageError(err, "open", path)
    }

    this.logger.debug("Schema ready", { path, operation: "open" })

    return {
      db,
      path,
      guard: new MemoryLock({ defaultTimeoutMs: DEFAULT_GUARD_TIMEOUT_MS }),
    }
  }

  private handleFor(entry: PoolEntry, pooled: boolean): SqliteHandle {
    let released = false

    return {
      db: entry.db,
      guard: entry.guard,
      path: entry.path,
      release: () => {
        if (released) return
        released = true

        entry.refs--
        if (entry.refs > 0) return

        if (pooled) this.shared.delete(entry.path)
        entry.db.close()
        this.logger.debug("Connection closed", { path: entry.path, operation: "close" })
      },
    }
  }
}

export const defaultSqliteHandlePool = new SqliteHandlePool()
