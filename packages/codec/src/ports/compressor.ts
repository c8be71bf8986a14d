/**
 * Byte-level compression stage of the pipeline.
 *
 * `id` is written into every frame so that a reader can pick the matching
 * decompressor; it must be stable across releases and unique per algorithm.
 */
export interface Compressor {
  readonly id: number
  readonly name: string

  compress(bytes: Uint8Array): Uint8Array

  /**
   * @throws CorruptionError when `bytes` were not produced by `compress`.
   */
  decompress(bytes: Uint8Array): Uint8Array
}
