import { CorruptionError } from "@vellum/errors"

export const FRAME_MAGIC = 0x56
export const FRAME_VERSION = 1
export const FRAME_HEADER_BYTES = 3

export type Frame = {
  compressorId: number
  payload: Uint8Array
}

/**
 * Prefix `payload` with `[magic, version, compressorId]`.
 */
export function writeFrame(compressorId: number, payload: Uint8Array): Uint8Array {
  const out = new Uint8Array(FRAME_HEADER_BYTES + payload.byteLength)

  out[0] = FRAME_MAGIC
  out[1] = FRAME_VERSION
  out[2] = compressorId
  out.set(payload, FRAME_HEADER_BYTES)

  return out
}

export function readFrame(bytes: Uint8Array): Frame {
  if (bytes.byteLength < FRAME_HEADER_BYTES) {
    throw new CorruptionError("entry is shorter than its header", {
      length: bytes.byteLength,
    })
  }

  const [magic, version, compressorId] = bytes

  if (magic !== FRAME_MAGIC) {
    throw new CorruptionError("unrecognized header", { magic })
  }

  if (version !== FRAME_VERSION) {
    throw new CorruptionError(`unsupported format version ${version}`, { version })
  }

  return {
    compressorId: compressorId ?? 0,
    payload: bytes.subarray(FRAME_HEADER_BYTES),
  }
}
