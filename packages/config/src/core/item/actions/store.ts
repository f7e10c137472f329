import type { StoreItemSpec } from "../../../ports/item"
import type { Slot } from "../../../ports/slot"
import type { RawValue } from "../../../ports/source"
import { isPresent, present } from "../../slot"
import { coerceValue } from "../coerce-value"

/** Last writer wins. */
export function accumulateStore<T>(item: StoreItemSpec<T>, _current: Slot<T>, raw: RawValue): Slot<T> {
  return present(coerceValue(item, raw))
}

export function applyStoreDefault<T>(item: StoreItemSpec<T>, value: Slot<T>): Slot<T> {
  return isPresent(value) ? value : item.default
}
