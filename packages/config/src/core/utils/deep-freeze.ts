function isPlainData(value: object): boolean {
  if (Array.isArray(value)) return true

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Freezes arrays and plain objects in place, recursively.
 *
 * Class instances (streams, dates, URLs) are left as they are.
 */
export function deepFreeze<T>(value: T, seen = new WeakSet<object>()): T {
  if (typeof value !== "object" || value === null) return value
  if (seen.has(value) || !isPlainData(value)) return value

  seen.add(value)
  Object.freeze(value)

  for (const child of Object.values(value)) {
    deepFreeze(child, seen)
  }

  return value
}
