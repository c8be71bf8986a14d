import type { CodecPipeline } from "@vellum/codec"
import { SerializationError } from "@vellum/errors"
import type { Entry, StoredRecord } from "./entry"

function isStoredRecord(record: unknown): boolean {
  return (
    typeof record === "object" &&
    record !== null &&
    "value" in record &&
    "metadata" in record &&
    "createdAt" in record &&
    "updatedAt" in record &&
    typeof record.createdAt === "number" &&
    typeof record.updatedAt === "number" &&
    Number.isFinite(record.createdAt) &&
    Number.isFinite(record.updatedAt)
  )
}

/**
 * Packs an entry and its timestamps into one blob through the pipeline.
 */
export class EntryCodec<V> {
  public constructor(private readonly pipeline: CodecPipeline<StoredRecord<V>>) {}

  encode(entry: Entry<V>): Uint8Array {
    return this.pipeline.pack({
      value: entry.value,
      metadata: entry.metadata,
      createdAt: entry.createdAt.getTime(),
      updatedAt: entry.updatedAt.getTime(),
    })
  }

  /**
   * @throws CorruptionError when the blob cannot be unframed or decompressed.
   * @throws SerializationError when the payload is not a stored entry.
   */
  decode(bytes: Uint8Array): Entry<V> {
    const record = this.pipeline.unpack(bytes)

    if (!isStoredRecord(record)) {
      throw SerializationError.malformed("payload is not a stored entry")
    }

    return {
      value: record.value,
      metadata: record.metadata,
      createdAt: new Date(record.createdAt),
      updatedAt: new Date(record.updatedAt),
    }
  }
}
