/**
 * Renders a value for an error message: strings verbatim, structured values
 * as JSON.
 */
export function formatValue(value: unknown): string {
  switch (typeof value) {
    case "string":
      return value
    case "number":
    case "bigint":
    case "boolean":
    case "undefined":
    case "symbol":
    case "function":
      return String(value)
  }

  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}
