function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` chain starting at `err` and return every value on it.
 *
 * Stops after `maxDepth` links or when a cause refers back to a value already
 * visited.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * First error in the cause chain that is an instance of `type`.
 *
 * @example
 * ```ts
 * const corruption = findInChain(err, CorruptionError)
 * if (corruption) logger.error("entry unreadable", { err: corruption })
 * ```
 */
export function findInChain<E extends Error>(
  err: unknown,
  type: abstract new (...args: never[]) => E,
): E | undefined {
  for (const link of errorChain(err)) {
    if (link instanceof type) return link
  }

  return undefined
}
