import { SerializationError } from "@vellum/errors"
import SuperJSON from "superjson"
import { assertSerializable } from "../../core/validation/assert-serializable"
import type { Codec } from "../../ports/codec"

function isEnvelope(value: unknown): boolean {
  return typeof value === "object" && value !== null && "json" in value
}

/**
 * Codec over superjson: JSON text that also carries dates, bigints, maps, sets,
 * `undefined`, non-finite numbers and byte arrays (as base64).
 *
 * Each codec owns its superjson instance, so registrations never leak into
 * other users of the library.
 */
export class SuperjsonCodec<T> implements Codec<T> {
  private readonly superjson = new SuperJSON()
  private readonly encoder = new TextEncoder()
  private readonly decoder = new TextDecoder("utf-8", { fatal: true })

  constructor() {
    this.superjson.registerCustom<Uint8Array, string>(
      {
        isApplicable: (v): v is Uint8Array => v instanceof Uint8Array,
        serialize: (v) => Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64"),
        deserialize: (v) => new Uint8Array(Buffer.from(v, "base64")),
      },
      "bytes",
    )
  }

  encode(value: T): Uint8Array {
    assertSerializable(value)

    return this.encoder.encode(this.superjson.stringify(value))
  }

  decode(bytes: Uint8Array): T {
    const text = this.decodeText(bytes)

    let envelope: unknown
    try {
      envelope = JSON.parse(text)
    } catch (err) {
      throw SerializationError.malformed("payload is not valid JSON", err)
    }

    if (!isEnvelope(envelope)) {
      throw SerializationError.malformed("payload is not a superjson envelope")
    }

    try {
      return this.superjson.parse<T>(text)
    } catch (err) {
      throw SerializationError.malformed("payload metadata is invalid", err)
    }
  }

  private decodeText(bytes: Uint8Array): string {
    try {
      return this.decoder.decode(bytes)
    } catch (err) {
      throw SerializationError.malformed("payload is not valid UTF-8", err)
    }
  }
}
