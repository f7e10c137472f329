import { batchFromMapping, copyMapping, type MappingValues } from "../../core/raw-batch"
import type { ItemSpec } from "../../ports/item"
import type { ConfigSource, RawValuesBatch } from "../../ports/source"

export type ObjectSourceOptions = {
  /**
   * Values keyed by item name. Keys that name no item are ignored, and a key
   * mapped to `undefined` counts as not provided.
   */
  values: MappingValues

  /**
   * @default "object"
   */
  name?: string
}

/**
 * A mapping the host program builds itself, e.g. from its own config format.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string
  private readonly values: MappingValues

  constructor(
    private readonly items: readonly ItemSpec[],
    options: ObjectSourceOptions,
  ) {
    this.name = options.name ?? "object"
    this.values = copyMapping(options.values)
  }

  async load(): Promise<RawValuesBatch> {
    return batchFromMapping(this.items, this.values)
  }
}
