export {
  DEFAULT_COMPRESSION_LEVEL,
  DeflateCompressor,
  type DeflateCompressorOptions,
} from "./adapters/compression/deflate-compressor"
export { IdentityCompressor } from "./adapters/compression/identity-compressor"
export { SuperjsonCodec } from "./adapters/superjson/superjson-codec"
export {
  FRAME_HEADER_BYTES,
  FRAME_MAGIC,
  FRAME_VERSION,
  readFrame,
  writeFrame,
} from "./core/frame"
export { CodecPipeline, type CodecPipelineDeps } from "./core/pipeline"
export { assertSerializable } from "./core/validation/assert-serializable"
export type { Codec } from "./ports/codec"
export type { Compressor } from "./ports/compressor"
export type { StructuredPrimitive, StructuredValue } from "./ports/structured-value"
