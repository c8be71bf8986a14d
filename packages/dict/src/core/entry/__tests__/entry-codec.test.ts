import {
  type Codec,
  CodecPipeline,
  DeflateCompressor,
  IdentityCompressor,
  SuperjsonCodec,
} from "@vellum/codec"
import { CorruptionError, SerializationError } from "@vellum/errors"
import { mock } from "vitest-mock-extended"
import { createEntry, type StoredRecord, withMetadata } from "../entry"
import { EntryCodec } from "../entry-codec"

describe("EntryCodec", () => {
  const codec = new EntryCodec<string>(
    new CodecPipeline({
      serializer: new SuperjsonCodec<StoredRecord<string>>(),
      compressor: new DeflateCompressor(),
    }),
  )

  it("round-trips value, metadata and timestamps", () => {
    const entry = withMetadata(createEntry("<html>", new Date(1_000)), { etag: "abc" })

    expect(codec.decode(codec.encode(entry))).toEqual(entry)
  })

  it("stores timestamps as epoch milliseconds", () => {
    const serializer = mock<Codec<StoredRecord<string>>>()
    serializer.encode.mockReturnValue(new Uint8Array())
    const entryCodec = new EntryCodec(
      new CodecPipeline({ serializer, compressor: new IdentityCompressor() }),
    )

    entryCodec.encode(createEntry("v", new Date(1_500)))

    expect(serializer.encode).toHaveBeenCalledExactlyOnceWith({
      value: "v",
      metadata: {},
      createdAt: 1_500,
      updatedAt: 1_500,
    })
  })

  it.each([
    ["missing metadata", { value: "v", createdAt: 1, updatedAt: 1 }],
    ["non-finite timestamp", { value: "v", metadata: {}, createdAt: Number.NaN, updatedAt: 1 }],
    ["string timestamp", { value: "v", metadata: {}, createdAt: "1", updatedAt: 1 }],
  ])("rejects a record with %s", (_label, record) => {
    const serializer = mock<Codec<StoredRecord<string>>>()
    serializer.decode.mockReturnValue(record as any)
    const entryCodec = new EntryCodec(
      new CodecPipeline({ serializer, compressor: new IdentityCompressor() }),
    )

    expect(() => entryCodec.decode(new Uint8Array([0x56, 1, 0]))).toThrow(
      "Stored bytes are not a valid value: payload is not a stored entry",
    )
  })

  it("lets pipeline errors through", () => {
    expect(() => codec.decode(new Uint8Array([0x00, 1, 0]))).toThrow(CorruptionError)
    expect(() => codec.decode(new Uint8Array([0x56, 1, 0, 0x7b]))).toThrow(SerializationError)
  })
})
