import type { ItemSpec } from "./item"

/**
 * Stands in for a flag or key that was seen but carries no usable content.
 * Sources emit it for `store_const`, `store_true`, `store_false` and `count`
 * items.
 */
export const PRESENT_WITHOUT_VALUE: unique symbol = Symbol("present-without-value")

export type PresenceMarker = typeof PRESENT_WITHOUT_VALUE

/** An uncoerced value exactly as a source observed it. */
export type RawValue = unknown

/**
 * Raw values one source observed in one resolution pass, per item name,
 * in the order the source saw them. Items the source has nothing for are
 * left out rather than mapped to an empty list.
 */
export type RawValuesBatch = ReadonlyMap<string, readonly RawValue[]>

/**
 * A source of configuration values.
 *
 * A ConfigSource only *observes* raw values. It does not coerce, validate,
 * merge or apply defaults; the resolver does that.
 *
 * Sources are pulled in registration order; for `store` items later sources
 * override earlier ones, for `append` and `count` they add to them.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "object", "json:settings.json", "command-line"
   */
  readonly name: string

  /**
   * Observe raw values for the items this source was bound to.
   *
   * Returns the same content when called again within one pass.
   */
  load(): Promise<RawValuesBatch>
}

/**
 * A source class the resolver can construct. The first constructor argument
 * is the snapshot of items registered before the source; the second is the
 * source's own options.
 */
export type SourceKind<S extends ConfigSource, O> = new (
  items: readonly ItemSpec[],
  options: O,
) => S
