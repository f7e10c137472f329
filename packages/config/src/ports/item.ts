import type { ZodType } from "zod"
import type { Slot } from "./slot"

export const itemActions = [
  "store",
  "store_const",
  "store_true",
  "store_false",
  "append",
  "count",
] as const

export type ItemAction = (typeof itemActions)[number]

export type ConstAction = "store_const" | "store_true" | "store_false"

/**
 * Turns a raw value (a command-line string, a JSON value, a mapping value)
 * into the item's typed value.
 *
 * Either a function, which signals rejection by throwing, or a zod schema.
 *
 * @example
 * ```ts
 * resolver.addItem("port", { type: Number })
 * resolver.addItem("tags", { type: (raw) => String(raw).split(",") })
 * resolver.addItem("retries", { type: z.coerce.number().int().min(0) })
 * ```
 */
export type Coercion<T> = ((raw: unknown) => T) | ZodType<T>

type ItemSpecBase = {
  /** Identifier, unique within a resolver */
  readonly name: string

  /** Shown in command-line help */
  readonly help: string | undefined
}

export type StoreItemSpec<T = unknown> = ItemSpecBase & {
  readonly action: "store"
  readonly type: Coercion<T>
  readonly required: boolean
  readonly choices: readonly T[] | undefined
  readonly default: Slot<T>
}

export type AppendItemSpec<T = unknown> = ItemSpecBase & {
  readonly action: "append"
  readonly type: Coercion<T>
  readonly required: boolean
  readonly choices: readonly T[] | undefined
  readonly default: Slot<readonly T[]>
}

/**
 * Shared by `store_const`, `store_true` (const `true`, default `false`) and
 * `store_false` (const `false`, default `true`). Only presence of a raw value
 * matters; its content is never read.
 */
export type StoreConstItemSpec<T = unknown> = ItemSpecBase & {
  readonly action: ConstAction
  readonly const: T
  readonly required: false
  readonly default: Slot<unknown>
}

export type CountItemSpec = ItemSpecBase & {
  readonly action: "count"
  readonly required: boolean
  readonly default: Slot<number>
}

export type ItemSpec = StoreItemSpec | AppendItemSpec | StoreConstItemSpec | CountItemSpec

type CommonItemOptions = {
  help?: string
}

export type StoreItemOptions<T> = CommonItemOptions & {
  action?: "store"
  /** @default string coercion */
  type?: Coercion<T>
  required?: boolean
  /** Permitted values, compared against the coerced value */
  choices?: readonly T[]
  default?: T
}

export type AppendItemOptions<T> = CommonItemOptions & {
  action: "append"
  type?: Coercion<T>
  required?: boolean
  choices?: readonly T[]
  /** Prefixed to the collected values */
  default?: readonly T[]
}

export type StoreConstItemOptions<T> = CommonItemOptions & {
  action: "store_const"
  const: T
  default?: unknown
}

export type StoreFlagItemOptions = CommonItemOptions & {
  action: "store_true" | "store_false"
  default?: unknown
}

export type CountItemOptions = CommonItemOptions & {
  action: "count"
  required?: boolean
  /** Added to the number of occurrences */
  default?: number
}

export type ItemOptions =
  | StoreItemOptions<unknown>
  | AppendItemOptions<unknown>
  | StoreConstItemOptions<unknown>
  | StoreFlagItemOptions
  | CountItemOptions
