/**
 * The result of a resolution pass: item name to final value, in item
 * registration order.
 *
 * @example
 * ```typescript
 * const resolver = new ConfigResolver()
 * resolver.addItem("port", { type: Number, default: 8080 })
 * resolver.addItem("verbose", { action: "count" })
 * resolver.addSource(JsonSource, { file: "settings.json" })
 * resolver.addSource(CommandLineSource, { argv: ["node", "app", "--port", "3000"] })
 *
 * const values = await resolver.resolve()
 *
 * values.get("port")        // 3000
 * values.explain("port")    // "command-line"
 * values.value              // { port: 3000, verbose: null }
 * ```
 */
export interface IValueStore {
  /** Frozen plain-object view of every entry */
  readonly value: Readonly<Record<string, unknown>>

  get(name: string): unknown

  /** `false` only for items suppressed by the global default policy */
  has(name: string): boolean

  keys(): string[]

  entries(): [string, unknown][]

  /**
   * Which source provided the final value for an item.
   *
   * @returns The last source that contributed a value, `"default"` when the
   * item's own default was used, `"fallback"` when the resolver's global
   * default was used, or `undefined` when the item has no entry.
   */
  explain(name: string): string | undefined

  /**
   * Distinct provenance labels, in item order.
   */
  sourcesUsed(): string[]

  /**
   * Structural equality: same names, each mapped to a deeply equal value.
   */
  equals(other: IValueStore): boolean
}
