import type { CountItemSpec } from "../../../ports/item"
import type { Slot } from "../../../ports/slot"
import { isPresent, present } from "../../slot"

export function accumulateCount(_item: CountItemSpec, current: Slot<number>): Slot<number> {
  return present(isPresent(current) ? current.value + 1 : 1)
}

/** The default is a starting count that occurrences add to. */
export function applyCountDefault(item: CountItemSpec, value: Slot<number>): Slot<number> {
  if (!isPresent(item.default)) return value
  if (!isPresent(value)) return item.default

  return present(item.default.value + value.value)
}
