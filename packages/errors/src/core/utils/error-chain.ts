function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` chain starting at `err` (inclusive).
 *
 * Stops at `maxDepth` entries or when a value repeats.
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
    current = getCause(current)
  }

  return chain
}

/**
 * First value in the cause chain accepted by `guard`.
 *
 * @example
 * ```ts
 * const bindFailure = findCause(err, (e): e is BindError => e instanceof BindError)
 * ```
 */
export function findCause<T>(err: unknown, guard: (value: unknown) => value is T): T | undefined {
  for (const value of errorChain(err)) {
    if (guard(value)) return value
  }

  return undefined
}
