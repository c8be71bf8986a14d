/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Codecs should be pure, deterministic transforms. Stores treat codec output
 * as opaque bytes.
 *
 * Failures must surface as `SerializationError`: `encode` when the value has
 * no byte form, `decode` when the bytes do not describe a valid value.
 *
 * @example
 * A plain JSON codec:
 * ```ts
 * const jsonCodec: Codec<Settings> = {
 *   encode(value) {
 *     return new TextEncoder().encode(JSON.stringify(value))
 *   },
 *   decode(bytes) {
 *     return JSON.parse(new TextDecoder().decode(bytes))
 *   },
 * }
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
