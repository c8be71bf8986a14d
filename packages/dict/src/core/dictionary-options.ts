import type { Clock } from "@vellum/clock"
import type { Codec } from "@vellum/codec"
import type { Logger } from "@vellum/logger"
import type { BytesStore, JournalMode, SqliteHandlePool } from "@vellum/store"
import type { StoredRecord } from "./entry/entry"
import type { IsolationMode } from "./isolation/isolation"

export type CompressionOptions = { kind: "deflate"; level?: number } | { kind: "none" }

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000

export type DictionaryOptions<V> = {
  /** Default `"serialized"`. */
  isolation?: IsolationMode

  /** Replaces the superjson serializer for stored records. */
  serializer?: Codec<StoredRecord<V>>

  /** Default deflate at level 6. */
  compression?: CompressionOptions

  busyTimeoutMs?: number

  /** Longest wait for a key under `"serialized"` isolation. */
  lockTimeoutMs?: number

  journalMode?: JournalMode
  pageSize?: number

  clock?: Clock
  logger?: Logger

  /**
   * Use this store instead of opening `path`. The dictionary does not close a
   * store it did not open.
   */
  store?: BytesStore

  pool?: SqliteHandlePool
}
