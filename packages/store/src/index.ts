export {
  MemoryBytesStore,
  type MemoryBytesStoreDeps,
  type MemoryBytesStoreOptions,
} from "./adapters/memory/memory-bytes-store"
export { isBusyCode, toStorageError } from "./adapters/sqlite/engine-error"
export { initSchema, readUserVersion, SCHEMA_VERSION } from "./adapters/sqlite/schema"
export {
  SqliteBytesStore,
  type SqliteBytesStoreDeps,
  type SqliteBytesStoreOptions,
} from "./adapters/sqlite/sqlite-bytes-store"
export {
  defaultSqliteHandlePool,
  MEMORY_PATH,
  type SqliteHandle,
  SqliteHandlePool,
  type SqliteHandlePoolDeps,
  type SqliteOpenOptions,
} from "./adapters/sqlite/sqlite-handle-pool"
export { assertValidKey } from "./core/validate-key"
export { assertPositiveInteger } from "./core/validate-options"
export type { BytesStore, StoreKey, StoreUpdater } from "./ports/bytes-store"
export {
  DEFAULT_BUSY_TIMEOUT_MS,
  DEFAULT_GUARD_TIMEOUT_MS,
  DEFAULT_JOURNAL_MODE,
  DEFAULT_PAGE_SIZE,
  type JournalMode,
} from "./ports/options"
export {
  found,
  notFound,
  type StoreFound,
  type StoreNotFound,
  type StoreResult,
} from "./ports/store-result"
