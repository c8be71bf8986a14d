import type { StructuredValue } from "@vellum/codec"

/** Metadata is any structured value; a fresh entry carries `{}`. */
export type Metadata = StructuredValue

export type Entry<V> = {
  readonly value: V
  readonly metadata: Metadata
  readonly createdAt: Date
  readonly updatedAt: Date
}

/**
 * The shape written to storage. Timestamps are epoch milliseconds.
 */
export type StoredRecord<V> = {
  value: V
  metadata: Metadata
  createdAt: number
  updatedAt: number
}

export function createEntry<V>(value: V, now: Date): Entry<V> {
  return { value, metadata: {}, createdAt: now, updatedAt: now }
}

/** Replace the value; metadata and `createdAt` are kept. */
export function withValue<V>(entry: Entry<V>, value: V, now: Date): Entry<V> {
  return { ...entry, value, updatedAt: now }
}

/** Replace the metadata; value and both timestamps are kept. */
export function withMetadata<V>(entry: Entry<V>, metadata: Metadata): Entry<V> {
  return { ...entry, metadata }
}
