import type Database from "better-sqlite3"
import { StorageError } from "@vellum/errors"
import type { JournalMode } from "../../ports/options"

export const SCHEMA_VERSION = 1

const CREATE_ENTRIES = `
  CREATE TABLE IF NOT EXISTS entries (
    key   TEXT PRIMARY KEY,
    value BLOB NOT NULL
  ) WITHOUT ROWID
`

export function readUserVersion(db: Database.Database): number {
  const version: unknown = db.pragma("user_version", { simple: true })
  return typeof version === "number" ? version : 0
}

/**
 * Create the `entries` table on a fresh file and stamp its version. A file
 * written by a newer format is refused rather than guessed at.
 */
export function initSchema(db: Database.Database, path: string): void {
  const version = readUserVersion(db)

  if (version > SCHEMA_VERSION) {
    throw new StorageError(
      `Database schema version ${version} is newer than supported version ${SCHEMA_VERSION}`,
      { operation: "open", path },
    )
  }

  db.exec(CREATE_ENTRIES)

  if (version < SCHEMA_VERSION) {
    db.pragma(`user_version = ${SCHEMA_VERSION}`)
  }
}

export function applyPragmas(
  db: Database.Database,
  opts: { journalMode: JournalMode; busyTimeoutMs: number },
): void {
  db.pragma(`busy_timeout = ${opts.busyTimeoutMs}`)
  db.pragma(`journal_mode = ${opts.journalMode.toUpperCase()}`)
}
