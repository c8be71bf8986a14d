import { InvalidKeyError } from "@vellum/errors"
import type { StoreKey } from "../ports/bytes-store"

export function assertValidKey(key: unknown): asserts key is StoreKey {
  if (typeof key !== "string" || key.length === 0) {
    throw new InvalidKeyError(key)
  }
}
