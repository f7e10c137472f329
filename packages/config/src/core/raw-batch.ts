import type { ItemSpec } from "../ports/item"
import { PRESENT_WITHOUT_VALUE, type RawValue, type RawValuesBatch } from "../ports/source"

export type MappingValues = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>

/** `true` for actions whose raw values are read; `false` where only presence counts. */
export function takesValue(item: ItemSpec): boolean {
  return item.action === "store" || item.action === "append"
}

function isReadonlyMap(values: MappingValues): values is ReadonlyMap<string, unknown> {
  return values instanceof Map
}

/**
 * Looks a key up without reaching the prototype chain. A key mapped to
 * `undefined` counts as not provided.
 */
function lookup(values: MappingValues, key: string): { found: boolean; value: unknown } {
  if (isReadonlyMap(values)) {
    const value = values.get(key)
    return { found: value !== undefined, value }
  }

  if (!Object.hasOwn(values, key)) return { found: false, value: undefined }

  const value = values[key]
  return { found: value !== undefined, value }
}

/**
 * Builds the batch for a flat key/value mapping: one raw value per item whose
 * name is a key, or a presence marker for items that only count presence.
 * Keys that name no item are ignored.
 */
export function batchFromMapping(items: readonly ItemSpec[], values: MappingValues): RawValuesBatch {
  const batch = new Map<string, readonly RawValue[]>()

  for (const item of items) {
    const { found, value } = lookup(values, item.name)
    if (!found) continue

    batch.set(item.name, [takesValue(item) ? value : PRESENT_WITHOUT_VALUE])
  }

  return batch
}

/** A shallow copy, so later changes to the caller's mapping are not seen. */
export function copyMapping(values: MappingValues): MappingValues {
  return isReadonlyMap(values) ? new Map(values) : { ...values }
}
