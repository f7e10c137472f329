import type { AppendItemSpec, ItemSpec } from "../../ports/item"
import type { Slot } from "../../ports/slot"
import type { RawValue } from "../../ports/source"
import { ABSENT } from "../slot"
import { accumulateAppend, applyAppendDefault } from "./actions/append"
import { accumulateCount, applyCountDefault } from "./actions/count"
import { accumulateStore, applyStoreDefault } from "./actions/store"
import { accumulateStoreConst, applyStoreConstDefault } from "./actions/store-const"

/**
 * Per-item working state for one resolution pass. Starts absent.
 */
export interface Accumulator {
  readonly item: ItemSpec

  /** Folds one raw value in. Throws `ConfigError` when coercion or a choice check fails. */
  add(raw: RawValue): void

  /** The value accumulated so far, before any default */
  current(): Slot<unknown>

  /** The accumulated value with the item's default applied */
  finish(): Slot<unknown>
}

function fold<I extends ItemSpec, V>(
  item: I,
  accumulate: (item: I, current: Slot<V>, raw: RawValue) => Slot<V>,
  applyDefault: (item: I, value: Slot<V>) => Slot<unknown>,
): Accumulator {
  let current: Slot<V> = ABSENT

  return {
    item,
    add(raw) {
      current = accumulate(item, current, raw)
    },
    current: () => current,
    finish: () => applyDefault(item, current),
  }
}

export function createAccumulator(item: ItemSpec): Accumulator {
  switch (item.action) {
    case "store":
      return fold(item, accumulateStore, applyStoreDefault)
    case "append":
      return fold<AppendItemSpec, readonly unknown[]>(item, accumulateAppend, applyAppendDefault)
    case "store_const":
    case "store_true":
    case "store_false":
      return fold(item, accumulateStoreConst, applyStoreConstDefault)
    case "count":
      return fold(item, accumulateCount, applyCountDefault)
  }
}
