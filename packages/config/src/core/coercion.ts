import { ZodType } from "zod"
import type { Coercion } from "../ports/item"

export type CoercionResult<T> = { ok: true; value: T } | { ok: false; error: unknown }

export function isCoercion(value: unknown): value is Coercion<unknown> {
  return typeof value === "function" || value instanceof ZodType
}

/**
 * Runs a coercion without letting it throw. A function signals rejection by
 * throwing; a schema by failing to parse.
 */
export function runCoercion<T>(coercion: Coercion<T>, raw: unknown): CoercionResult<T> {
  if (coercion instanceof ZodType) {
    const parsed = coercion.safeParse(raw)

    return parsed.success ? { ok: true, value: parsed.data } : { ok: false, error: parsed.error }
  }

  try {
    return { ok: true, value: coercion(raw) }
  } catch (error) {
    return { ok: false, error }
  }
}

/**
 * The coercion used when an item declares no `type`: strings pass through,
 * everything else is rendered as text (JSON for objects and arrays).
 */
export function asString(raw: unknown): string {
  if (typeof raw === "string") return raw
  if (typeof raw === "object" && raw !== null) return JSON.stringify(raw)

  return String(raw)
}
