import { BaseError, CorruptionError, SerializationError } from "@vellum/errors"
import { DeflateCompressor } from "../adapters/compression/deflate-compressor"
import { IdentityCompressor } from "../adapters/compression/identity-compressor"
import type { Codec } from "../ports/codec"
import type { Compressor } from "../ports/compressor"
import { readFrame, writeFrame } from "./frame"

export type CodecPipelineDeps<T> = {
  serializer: Codec<T>
  compressor: Compressor

  /**
   * Extra decompressors accepted when reading, for frames written by a
   * different compressor than the current one. Identity and deflate are
   * always readable.
   */
  decompressors?: readonly Compressor[]
}

/**
 * `pack(value) = frame(compress(serialize(value)))` and its inverse.
 *
 * Stateless once built; safe to share between stores.
 */
export class CodecPipeline<T> {
  private readonly decompressors = new Map<number, Compressor>()

  public constructor(private readonly deps: CodecPipelineDeps<T>) {
    const readable = [
      new IdentityCompressor(),
      new DeflateCompressor(),
      ...(deps.decompressors ?? []),
      deps.compressor,
    ]

    for (const compressor of readable) {
      this.decompressors.set(compressor.id, compressor)
    }
  }

  get compressor(): Compressor {
    return this.deps.compressor
  }

  pack(value: T): Uint8Array {
    const serialized = this.serialize(value)
    const compressed = this.deps.compressor.compress(serialized)

    return writeFrame(this.deps.compressor.id, compressed)
  }

  /**
   * @throws CorruptionError when the frame or compressed payload is damaged.
   * @throws SerializationError when the decompressed bytes are not a value.
   */
  unpack(bytes: Uint8Array): T {
    const frame = readFrame(bytes)
    const compressor = this.decompressors.get(frame.compressorId)

    if (!compressor) {
      throw new CorruptionError(`unknown compressor id ${frame.compressorId}`, {
        compressorId: frame.compressorId,
      })
    }

    const decompressed = this.decompress(compressor, frame.payload)

    return this.deserialize(decompressed)
  }

  private serialize(value: T): Uint8Array {
    try {
      return this.deps.serializer.encode(value)
    } catch (err) {
      if (err instanceof BaseError) throw err
      throw new SerializationError("Serializer failed to encode value", {}, err)
    }
  }

  private decompress(compressor: Compressor, payload: Uint8Array): Uint8Array {
    try {
      return compressor.decompress(payload)
    } catch (err) {
      if (err instanceof CorruptionError) throw err
      throw new CorruptionError(
        "payload cannot be decompressed",
        { compressor: compressor.name },
        err,
      )
    }
  }

  private deserialize(bytes: Uint8Array): T {
    try {
      return this.deps.serializer.decode(bytes)
    } catch (err) {
      if (err instanceof SerializationError) throw err
      throw SerializationError.malformed("serializer rejected payload", err)
    }
  }
}
