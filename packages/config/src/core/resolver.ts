import { type Logger, NullLogger } from "@stratum/logger"
import type {
  AppendItemOptions,
  AppendItemSpec,
  CountItemOptions,
  CountItemSpec,
  ItemOptions,
  ItemSpec,
  StoreConstItemOptions,
  StoreConstItemSpec,
  StoreFlagItemOptions,
  StoreItemOptions,
  StoreItemSpec,
} from "../ports/item"
import type { ConfigResolverOptions, GlobalDefaultPolicy, ResolverState } from "../ports/resolver"
import type { ConfigSource, SourceKind } from "../ports/source"
import { ConfigError } from "./errors"
import { type Accumulator, createAccumulator } from "./item/accumulator"
import { defineItem } from "./item/define-item"
import { isPresent } from "./slot"
import { ValueStore } from "./value-store"

type RegisteredSource = {
  source: ConfigSource
  /** Names of the items registered before the source */
  sees: ReadonlySet<string>
}

/**
 * Merges values for a fixed set of named items from several sources.
 *
 * Sources are pulled in registration order. Each source only sees the items
 * that were registered before it.
 *
 * @example
 * ```typescript
 * const resolver = new ConfigResolver({ logger })
 *
 * resolver.addItem("level", { choices: ["debug", "info", "warn"], default: "info" })
 * resolver.addItem("include", { action: "append", default: ["base"] })
 * resolver.addItem("verbose", { action: "count" })
 *
 * resolver.addSource(JsonSource, { file: "settings.json", required: false })
 * resolver.addSource(CommandLineSource, {})
 *
 * const settings = await resolver.resolve()
 * ```
 */
export class ConfigResolver {
  private readonly itemList: ItemSpec[] = []
  private readonly sourceList: RegisteredSource[] = []
  private readonly globalDefault: GlobalDefaultPolicy
  private readonly logger: Logger

  private passes = 0
  private currentState: ResolverState = "building"
  private last: ValueStore | undefined

  constructor(options: ConfigResolverOptions = {}) {
    this.globalDefault = options.globalDefault ?? { kind: "null" }
    this.logger = (options.logger ?? new NullLogger()).child({ component: "config-resolver" })
  }

  get state(): ResolverState {
    return this.currentState
  }

  /**
   * Registers an item. Sources registered from now on will see it; sources
   * registered earlier will not.
   *
   * @throws {ConfigError} `invalid_name`, `invalid_type`, `unsupported_action`
   * or `duplicate_item`
   */
  addItem<T = string>(name: string, options?: StoreItemOptions<T>): StoreItemSpec<T>
  addItem<T = string>(name: string, options: AppendItemOptions<T>): AppendItemSpec<T>
  addItem<T>(name: string, options: StoreConstItemOptions<T>): StoreConstItemSpec<T>
  addItem(name: string, options: StoreFlagItemOptions): StoreConstItemSpec<boolean>
  addItem(name: string, options: CountItemOptions): CountItemSpec
  addItem(name: string, options: ItemOptions = {}): ItemSpec {
    this.assertIdle("add an item")

    const item = defineItem(name, options)

    if (this.itemList.some((existing) => existing.name === item.name)) {
      throw ConfigError.duplicateItem(item.name)
    }

    this.itemList.push(item)
    this.currentState = "building"

    return item
  }

  /**
   * Constructs a source bound to a snapshot of the items registered so far
   * and appends it to the pull order.
   *
   * @returns The constructed source, for source-specific wiring before resolution
   */
  addSource<S extends ConfigSource, O>(kind: SourceKind<S, O>, options: NoInfer<O>): S {
    this.assertIdle("add a source")

    const snapshot = Object.freeze([...this.itemList])
    const source = new kind(snapshot, options)

    this.sourceList.push({ source, sees: new Set(snapshot.map((item) => item.name)) })
    this.currentState = "building"

    return source
  }

  items(): readonly ItemSpec[] {
    return [...this.itemList]
  }

  sources(): readonly ConfigSource[] {
    return this.sourceList.map(({ source }) => source)
  }

  /** The result of the last successful pass; cleared when a pass fails. */
  lastResult(): ValueStore | undefined {
    return this.last
  }

  /**
   * Merges all sources and applies defaults without checking `required`.
   *
   * @throws {ConfigError} when a value fails coercion or a choice check
   */
  resolvePartial(): Promise<ValueStore> {
    return this.run(false)
  }

  /**
   * Like {@link resolvePartial}, then fails with `required_value_missing` for
   * the first required item that no source provided. Item defaults do not
   * satisfy `required`.
   */
  resolve(): Promise<ValueStore> {
    return this.run(true)
  }

  private assertIdle(operation: string): void {
    if (this.currentState === "resolving") {
      throw ConfigError.resolutionInProgress(operation)
    }
  }

  private async run(enforceRequired: boolean): Promise<ValueStore> {
    this.assertIdle("resolve")
    this.currentState = "resolving"

    const log = this.logger.child({ pass: ++this.passes })

    try {
      const result = await this.merge(log, enforceRequired)

      this.currentState = "resolved"
      this.last = result
      log.info("configuration resolved", {
        items: result.keys().length,
        sources: this.sourceList.length,
      })

      return result
    } catch (err) {
      this.currentState = "failed"
      this.last = undefined
      log.warn("configuration resolution failed", { err })

      throw err
    }
  }

  private async merge(log: Logger, enforceRequired: boolean): Promise<ValueStore> {
    const accumulators = new Map<string, Accumulator>(
      this.itemList.map((item) => [item.name, createAccumulator(item)]),
    )
    const contributors = new Map<string, string>()

    for (const { source, sees } of this.sourceList) {
      const batch = await source.load()

      log.debug("pulled source", { source: source.name, items: batch.size })

      for (const [name, raws] of batch) {
        const accumulator = accumulators.get(name)
        if (!accumulator || !sees.has(name) || raws.length === 0) continue

        for (const raw of raws) {
          accumulator.add(raw)
        }
        contributors.set(name, source.name)
      }
    }

    if (enforceRequired) {
      for (const { item, current } of accumulators.values()) {
        if (item.required && !isPresent(current())) {
          throw ConfigError.requiredValueMissing(item.name)
        }
      }
    }

    const entries: [string, unknown][] = []
    const provenance = new Map<string, string>()

    for (const { item, finish } of accumulators.values()) {
      const final = finish()

      if (isPresent(final)) {
        entries.push([item.name, final.value])
        provenance.set(item.name, contributors.get(item.name) ?? "default")
      } else if (this.globalDefault.kind !== "suppress") {
        entries.push([item.name, this.globalDefault.kind === "fallback" ? this.globalDefault.value : null])
        provenance.set(item.name, "fallback")
      }
    }

    return new ValueStore(entries, provenance)
  }
}
