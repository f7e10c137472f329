import type { AppendItemSpec } from "../../../ports/item"
import type { Slot } from "../../../ports/slot"
import type { RawValue } from "../../../ports/source"
import { isPresent, present } from "../../slot"
import { coerceValue } from "../coerce-value"

export function accumulateAppend<T>(
  item: AppendItemSpec<T>,
  current: Slot<readonly T[]>,
  raw: RawValue,
): Slot<readonly T[]> {
  const value = coerceValue(item, raw)

  return present(Object.freeze(isPresent(current) ? [...current.value, value] : [value]))
}

/** The default is a prefix: `[...default, ...collected]`. */
export function applyAppendDefault<T>(
  item: AppendItemSpec<T>,
  value: Slot<readonly T[]>,
): Slot<readonly T[]> {
  if (!isPresent(item.default)) return value
  if (!isPresent(value)) return item.default

  return present(Object.freeze([...item.default.value, ...value.value]))
}
