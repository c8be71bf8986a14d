import { deflateSync, inflateSync } from "node:zlib"
import { ConfigurationError, CorruptionError } from "@vellum/errors"
import type { Compressor } from "../../ports/compressor"

export const DEFAULT_COMPRESSION_LEVEL = 6

export type DeflateCompressorOptions = {
  /** zlib level, 0 (store) to 9 (smallest). */
  level?: number
}

export class DeflateCompressor implements Compressor {
  readonly id = 1
  readonly name = "deflate"
  readonly level: number

  constructor(opts: DeflateCompressorOptions = {}) {
    const level = opts.level ?? DEFAULT_COMPRESSION_LEVEL

    if (!Number.isInteger(level) || level < 0 || level > 9) {
      throw new ConfigurationError(`compression level must be an integer 0-9, got: ${level}`)
    }

    this.level = level
  }

  compress(bytes: Uint8Array): Uint8Array {
    return new Uint8Array(deflateSync(bytes, { level: this.level }))
  }

  decompress(bytes: Uint8Array): Uint8Array {
    try {
      return new Uint8Array(inflateSync(bytes))
    } catch (err) {
      throw new CorruptionError("payload cannot be decompressed", { compressor: this.name }, err)
    }
  }
}
