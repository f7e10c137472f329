import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard for AppError. Structural, so errors from another copy of this
 * package (or a hand-built object of the same shape) are recognised too.
 *
 * @example
 * ```ts
 * try {
 *   await resolver.resolve()
 * } catch (err) {
 *   if (isAppError(err) && err.code === "required_value_missing") {
 *     console.error(`missing setting: ${String(err.context.item)}`)
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
