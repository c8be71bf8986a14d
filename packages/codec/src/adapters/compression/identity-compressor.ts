import type { Compressor } from "../../ports/compressor"

export class IdentityCompressor implements Compressor {
  readonly id = 0
  readonly name = "none"

  compress(bytes: Uint8Array): Uint8Array {
    return bytes
  }

  decompress(bytes: Uint8Array): Uint8Array {
    return bytes
  }
}
