import type { StoreConstItemSpec } from "../../../ports/item"
import type { Slot } from "../../../ports/slot"
import { PRESENT_WITHOUT_VALUE, type PresenceMarker } from "../../../ports/source"
import { isPresent, present } from "../../slot"

const seen = present(PRESENT_WITHOUT_VALUE)

/**
 * Only presence matters. Repeats collapse into one marker; the constant is
 * substituted when defaults are applied.
 */
export function accumulateStoreConst(): Slot<PresenceMarker> {
  return seen
}

export function applyStoreConstDefault<T>(
  item: StoreConstItemSpec<T>,
  value: Slot<PresenceMarker>,
): Slot<unknown> {
  return isPresent(value) ? present(item.const) : item.default
}
