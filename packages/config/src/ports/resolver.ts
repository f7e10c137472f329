import type { Logger } from "@stratum/logger"

/**
 * What an item with no value after its own defaulting ends up as.
 *
 * - `null`: the item is present with value `null`
 * - `fallback`: the item is present with `value`
 * - `suppress`: the item has no entry at all
 */
export type GlobalDefaultPolicy =
  | { kind: "null" }
  | { kind: "fallback"; value: unknown }
  | { kind: "suppress" }

export type ResolverState = "building" | "resolving" | "resolved" | "failed"

export type ConfigResolverOptions = {
  /** @default { kind: "null" } */
  globalDefault?: GlobalDefaultPolicy

  /** @default NullLogger */
  logger?: Logger
}
