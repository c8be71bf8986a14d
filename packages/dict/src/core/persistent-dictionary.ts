import { type Clock, SystemClock } from "@vellum/clock"
import {
  CodecPipeline,
  type Compressor,
  DeflateCompressor,
  IdentityCompressor,
  type StructuredValue,
  SuperjsonCodec,
} from "@vellum/codec"
import { ClosedError, ConfigurationError, KeyNotFoundError } from "@vellum/errors"
import { type Logger, NullLogger } from "@vellum/logger"
import { assertValidKey, type BytesStore, SqliteBytesStore } from "@vellum/store"
import { z } from "zod/mini"
import { dictionaryOptionsSchema } from "../config/schema"
import {
  type CompressionOptions,
  DEFAULT_LOCK_TIMEOUT_MS,
  type DictionaryOptions,
} from "./dictionary-options"
import {
  createEntry,
  type Entry,
  type Metadata,
  type StoredRecord,
  withMetadata,
  withValue,
} from "./entry/entry"
import { EntryCodec } from "./entry/entry-codec"
import { EngineIsolation } from "./isolation/engine-isolation"
import type { Isolation } from "./isolation/isolation"
import { SerializedIsolation } from "./isolation/serialized-isolation"

export type DictionaryState = "open" | "closed"

export type MergeSource<V> = Iterable<readonly [string, V]> | AsyncIterable<readonly [string, V]>

export type MergeOptions = {
  /** Replace values of keys that already exist. Default false. */
  overwrite?: boolean
}

function createCompressor(opts: CompressionOptions | undefined): Compressor {
  if (opts?.kind === "none") return new IdentityCompressor()

  return new DeflateCompressor(opts?.level !== undefined ? { level: opts.level } : {})
}

function validateOptions<V>(path: string, options: DictionaryOptions<V>): void {
  const { isolation, compression, busyTimeoutMs, lockTimeoutMs, journalMode, pageSize } = options
  const result = dictionaryOptionsSchema.safeParse({
    isolation,
    compression,
    busyTimeoutMs,
    lockTimeoutMs,
    journalMode,
    pageSize,
  })

  if (!result.success) {
    throw new ConfigurationError(z.prettifyError(result.error))
  }

  if (!options.store && path.length === 0) {
    throw new ConfigurationError("path must be a non-empty string")
  }
}

/**
 * Durable mapping of string keys to entries (value, metadata and timestamps)
 * in one SQLite file.
 *
 * Concurrent callers may share an instance, or open several instances on the
 * same file: they share one connection and one key guard. Each operation on a
 * key is atomic with respect to every other operation on that key; `set` and
 * `meta` are read-modify-writes that never lose the half they do not touch.
 *
 * @example
 * ```ts
 * const pages = new PersistentDictionary<string>("cache.db")
 *
 * await pages.set("http://example.com", "<html>...</html>")
 * await pages.meta("http://example.com", { etag: "abc" })
 * await pages.getValue("http://example.com") // "<html>...</html>"
 *
 * await pages.close()
 * ```
 */
export class PersistentDictionary<V = StructuredValue> implements AsyncIterable<string> {
  readonly path: string

  private readonly store: BytesStore
  private readonly ownsStore: boolean
  private readonly codec: EntryCodec<V>
  private readonly isolation: Isolation
  private readonly clock: Clock
  private readonly logger: Logger
  private current: DictionaryState = "open"

  public constructor(path: string, options: DictionaryOptions<V> = {}) {
    validateOptions(path, options)

    const isolationMode = options.isolation ?? "serialized"

    this.path = path
    this.clock = options.clock ?? new SystemClock()
    this.logger = (options.logger ?? new NullLogger()).child({
      module: "persistent-dictionary",
      path,
      isolation: isolationMode,
    })

    this.codec = new EntryCodec(
      new CodecPipeline<StoredRecord<V>>({
        serializer: options.serializer ?? new SuperjsonCodec<StoredRecord<V>>(),
        compressor: createCompressor(options.compression),
      }),
    )

    this.ownsStore = options.store === undefined
    this.store =
      options.store ??
      new SqliteBytesStore(
        {
          path,
          ...(options.busyTimeoutMs !== undefined && { busyTimeoutMs: options.busyTimeoutMs }),
          ...(options.journalMode !== undefined && { journalMode: options.journalMode }),
          ...(options.pageSize !== undefined && { pageSize: options.pageSize }),
        },
        {
          ...(options.pool !== undefined && { pool: options.pool }),
          ...(options.logger !== undefined && { logger: options.logger }),
        },
      )

    this.isolation =
      isolationMode === "engine"
        ? new EngineIsolation(this.store)
        : new SerializedIsolation(
            { store: this.store, logger: this.logger },
            { lockTimeoutMs: options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS },
          )

    this.logger.debug("Dictionary opened", { operation: "open" })
  }

  get state(): DictionaryState {
    return this.current
  }

  async contains(key: string): Promise<boolean> {
    this.assertUsable(key, "contains")

    return this.isolation.run(key, "contains", () => this.store.has(key))
  }

  /**
   * The full entry for `key`, or `fallback` when it is absent. A stored entry
   * that cannot be decoded raises instead of reading as absent.
   */
  get(key: string): Promise<Entry<V> | undefined>
  get<F>(key: string, fallback: F): Promise<Entry<V> | F>
  async get<F>(key: string, fallback?: F): Promise<Entry<V> | F | undefined> {
    this.assertUsable(key, "get")

    const entry = await this.isolation.run(key, "get", () => this.read(key))

    return entry ?? fallback
  }

  getValue(key: string): Promise<V | undefined>
  getValue<F>(key: string, fallback: F): Promise<V | F>
  async getValue<F>(key: string, fallback?: F): Promise<V | F | undefined> {
    const entry = await this.get(key)

    return entry === undefined ? fallback : entry.value
  }

  /**
   * Insert or replace the value of `key`. Existing metadata and `createdAt`
   * are kept; `updatedAt` is refreshed.
   */
  async set(key: string, value: V): Promise<void> {
    this.assertUsable(key, "set")

    await this.upsert(key, value, "set", true)
  }

  /**
   * Read the metadata of `key`, or replace it when `metadata` is given.
   *
   * @throws KeyNotFoundError when `key` is absent, in both forms.
   */
  meta(key: string): Promise<Metadata>
  meta(key: string, metadata: Metadata): Promise<void>
  async meta(key: string, ...rest: [] | [metadata: Metadata]): Promise<Metadata | void> {
    if (rest.length === 0) return this.getMeta(key)

    await this.setMeta(key, rest[0])
  }

  async getMeta(key: string): Promise<Metadata> {
    const entry = await this.get(key)

    if (entry === undefined) throw new KeyNotFoundError(key)

    return entry.metadata
  }

  /** Replace metadata only; value and both timestamps are kept. */
  async setMeta(key: string, metadata: Metadata): Promise<void> {
    this.assertUsable(key, "meta")

    await this.isolation.modify(key, "meta", (current) => {
      if (current.kind === "not_found") throw new KeyNotFoundError(key)

      const entry = this.decode(key, current.value)

      return this.codec.encode(withMetadata(entry, metadata))
    })
  }

  /** Remove `key` with its metadata. Absent keys are ignored. */
  async delete(key: string): Promise<void> {
    this.assertUsable(key, "delete")

    await this.isolation.run(key, "delete", () => this.store.delete(key))
  }

  /**
   * Keys in ascending order, read page by page. Concurrent writes may or may
   * not be observed; each call starts over.
   */
  async *keys(): AsyncIterableIterator<string> {
    this.assertOpen("keys")

    yield* this.store.keys()
  }

  async *values(): AsyncIterableIterator<V> {
    for await (const [, entry] of this.entries()) {
      yield entry.value
    }
  }

  async *items(): AsyncIterableIterator<[string, V]> {
    for await (const [key, entry] of this.entries()) {
      yield [key, entry.value]
    }
  }

  async *entries(): AsyncIterableIterator<[string, Entry<V>]> {
    this.assertOpen("entries")

    for await (const [key, bytes] of this.store.entries()) {
      yield [key, this.decode(key, bytes)]
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return this.keys()
  }

  async size(): Promise<number> {
    this.assertOpen("size")

    return this.store.count()
  }

  async clear(): Promise<void> {
    this.assertOpen("clear")

    await this.store.clear()
    this.logger.debug("Dictionary cleared", { operation: "clear" })
  }

  /**
   * Copy values from `source`, which may be another dictionary's `items()`.
   * Keys already present are skipped unless `overwrite` is set; metadata of
   * existing entries is kept either way.
   *
   * @returns the number of keys written.
   */
  async merge(source: MergeSource<V>, opts: MergeOptions = {}): Promise<number> {
    this.assertOpen("merge")

    const overwrite = opts.overwrite ?? false
    let written = 0

    for await (const [key, value] of source) {
      this.assertUsable(key, "merge")

      if (await this.upsert(key, value, "merge", overwrite)) written++
    }

    return written
  }

  /** Idempotent. Every other operation fails with `ClosedError` afterwards. */
  async close(): Promise<void> {
    if (this.current === "closed") return

    this.current = "closed"

    if (this.ownsStore) await this.store.close()

    this.logger.debug("Dictionary closed", { operation: "close" })
  }

  private async upsert(
    key: string,
    value: V,
    operation: string,
    overwrite: boolean,
  ): Promise<boolean> {
    let written = false

    await this.isolation.modify(key, operation, (current) => {
      const now = this.clock.now()

      if (current.kind === "not_found") {
        written = true
        return this.codec.encode(createEntry(value, now))
      }

      if (!overwrite) {
        written = false
        return undefined
      }

      written = true
      return this.codec.encode(withValue(this.decode(key, current.value), value, now))
    })

    return written
  }

  private async read(key: string): Promise<Entry<V> | undefined> {
    const result = await this.store.get(key)

    return result.kind === "found" ? this.decode(key, result.value) : undefined
  }

  private decode(key: string, bytes: Uint8Array): Entry<V> {
    try {
      return this.codec.decode(bytes)
    } catch (err) {
      this.logger.error("Stored entry could not be decoded", { key, err })
      throw err
    }
  }

  private assertOpen(operation: string): void {
    if (this.current === "closed") throw new ClosedError("dictionary", operation)
  }

  private assertUsable(key: string, operation: string): void {
    this.assertOpen(operation)
    assertValidKey(key)
  }
}
