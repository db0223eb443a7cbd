/**
 * An error followed by every `cause` behind it, outermost first. This is the
 * order `formatError` prints, one entry per `caused by:` line.
 *
 * The walk ends at the first value without a cause, at a value already seen,
 * or after `maxDepth` entries.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []

  for (
    let current: unknown = err;
    current != null && chain.length < maxDepth && !chain.includes(current);
    current = causeOf(current)
  ) {
    chain.push(current)
  }

  return chain
}

function causeOf(value: unknown): unknown {
  if (typeof value !== "object" || value === null || !("cause" in value)) return undefined

  return value.cause
}
