import { isDeepStrictEqual } from "node:util"
import type { AppendItemSpec, StoreItemSpec } from "../../ports/item"
import type { RawValue } from "../../ports/source"
import { runCoercion } from "../coercion"
import { ConfigError } from "../errors"

/**
 * Coerces one raw value for a value-taking item, then checks the coerced
 * value (never the raw one) against the item's choices.
 */
export function coerceValue<T>(item: StoreItemSpec<T> | AppendItemSpec<T>, raw: RawValue): T {
  const result = runCoercion(item.type, raw)

  if (!result.ok) {
    throw ConfigError.invalidValue(item.name, raw, result.error)
  }

  const { choices } = item
  if (choices && !choices.some((choice) => isDeepStrictEqual(choice, result.value))) {
    throw ConfigError.invalidChoice(item.name, result.value, choices)
  }

  return result.value
}
