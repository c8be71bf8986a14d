export type JournalMode = "wal" | "delete"

export const DEFAULT_BUSY_TIMEOUT_MS = 10_000
export const DEFAULT_PAGE_SIZE = 256
export const DEFAULT_JOURNAL_MODE: JournalMode = "wal"
export const DEFAULT_GUARD_TIMEOUT_MS = 10_000
