import { SerializationError } from "@vellum/errors"

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Reject values outside the structured-data model before they reach the
 * serializer: functions, symbols, class instances and cycles. Shared
 * (non-cyclic) references are allowed.
 *
 * @throws SerializationError naming the offending path, e.g. `$.items[2].handle`.
 */
export function assertSerializable(value: unknown): void {
  const ancestors = new Set<object>()

  const visit = (current: unknown, path: string): void => {
    if (typeof current === "function") {
      throw SerializationError.unsupported(path, "functions are not supported")
    }

    if (typeof current === "symbol") {
      throw SerializationError.unsupported(path, "symbols are not supported")
    }

    if (typeof current !== "object" || current === null) return

    if (current instanceof Date || current instanceof Uint8Array) return

    if (ancestors.has(current)) {
      throw SerializationError.unsupported(path, "cyclic structures are not supported")
    }

    ancestors.add(current)

    try {
      if (Array.isArray(current)) {
        current.forEach((item: unknown, index) => visit(item, `${path}[${index}]`))
      } else if (current instanceof Map) {
        let index = 0
        for (const [key, item] of current) {
          visit(key, `${path}<key ${index}>`)
          visit(item, `${path}<value ${index}>`)
          index++
        }
      } else if (current instanceof Set) {
        let index = 0
        for (const item of current) {
          visit(item, `${path}{${index}}`)
          index++
        }
      } else if (isPlainObject(current)) {
        for (const [key, item] of Object.entries(current)) {
          visit(item, `${path}.${key}`)
        }
      } else {
        throw SerializationError.unsupported(
          path,
          `instances of ${current.constructor.name} are not supported`,
        )
      }
    } finally {
      ancestors.delete(current)
    }
  }

  visit(value, "$")
}
