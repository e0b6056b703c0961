type ErrorClass = abstract new (...args: never[]) => unknown;

/**
 * True when `iterable` holds at least one instance of any of `classes`.
 */
export function hasInstance(iterable: Iterable<unknown>, ...classes: ErrorClass[]): boolean {
  for (const item of iterable) {
    if (classes.some((cls) => item instanceof cls)) return true;
  }
  return false;
}

/**
 * Walk an error and its `cause` chain, starting with `error` itself.
 *
 * Stops at the first missing cause, and on a cycle.
 */
export function* exceptionChain(error: unknown): Generator<unknown, void, undefined> {
  const seen = new Set<unknown>();
  let current = error;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    yield current;
    current = current instanceof Error ? current.cause : undefined;
  }
}

export function isCausedBy(error: unknown, ...classes: ErrorClass[]): boolean {
  return hasInstance(exceptionChain(error), ...classes);
}
