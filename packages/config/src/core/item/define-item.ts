import { z } from "zod"
import {
  type AppendItemSpec,
  type Coercion,
  type CountItemSpec,
  type ItemAction,
  type ItemOptions,
  type ItemSpec,
  itemActions,
  type StoreConstItemSpec,
  type StoreItemSpec,
} from "../../ports/item"
import { asString, isCoercion } from "../coercion"
import { ConfigError } from "../errors"
import { present, slotOf } from "../slot"
import { deepFreeze } from "../utils/deep-freeze"

const itemNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must start with a letter or underscore and contain only letters, digits and underscores")

const itemActionSchema = z.enum(itemActions)

/** Actions that exist on command-line parsers but have no accumulation rule here */
const notImplementedActions = new Set(["append_const", "extend"])

const acceptedOptions: Record<ItemAction, ReadonlySet<string>> = {
  store: new Set(["action", "type", "required", "choices", "default", "help"]),
  append: new Set(["action", "type", "required", "choices", "default", "help"]),
  store_const: new Set(["action", "const", "default", "help"]),
  store_true: new Set(["action", "default", "help"]),
  store_false: new Set(["action", "default", "help"]),
  count: new Set(["action", "required", "default", "help"]),
}

function parseName(name: unknown): string {
  const result = itemNameSchema.safeParse(name)

  if (!result.success) {
    throw ConfigError.invalidName(name, result.error.issues[0]?.message ?? "not an identifier")
  }

  return result.data
}

function parseAction(name: string, action: unknown): ItemAction {
  const result = itemActionSchema.safeParse(action ?? "store")

  if (result.success) return result.data

  const reason =
    typeof action === "string" && notImplementedActions.has(action)
      ? "action not implemented"
      : "unknown action"

  throw ConfigError.unsupportedAction(name, action, reason)
}

function parseType(name: string, type: unknown): Coercion<unknown> {
  if (type === undefined) return asString
  if (isCoercion(type)) return type

  throw ConfigError.invalidType(name, type)
}

function freezeList<T>(list: readonly T[] | undefined): readonly T[] | undefined {
  return list && deepFreeze([...list])
}

/**
 * Validates item options and builds the frozen spec for one item. Defaults,
 * constants and choices are frozen deeply, in place when they are plain data.
 *
 * Options the action does not use are rejected rather than ignored, so a
 * `nargs`, or a `type` on a flag, fails here instead of being silently dropped.
 */
export function defineItem(rawName: unknown, options: ItemOptions): ItemSpec {
  const name = parseName(rawName)
  const action = parseAction(name, options.action)

  for (const key of Object.keys(options)) {
    if (!acceptedOptions[action].has(key)) {
      throw ConfigError.unsupportedAction(name, action, `option '${key}' is not supported`)
    }
  }

  const help = options.help

  switch (options.action) {
    case undefined:
    case "store":
      return Object.freeze({
        name,
        help,
        action: "store",
        type: parseType(name, options.type),
        required: options.required ?? false,
        choices: freezeList(options.choices),
        default: slotOf(deepFreeze(options.default)),
      } satisfies StoreItemSpec)
    case "append":
      return Object.freeze({
        name,
        help,
        action: "append",
        type: parseType(name, options.type),
        required: options.required ?? false,
        choices: freezeList(options.choices),
        default: slotOf(freezeList(options.default)),
      } satisfies AppendItemSpec)
    case "store_const":
      if (!Object.hasOwn(options, "const")) {
        throw ConfigError.unsupportedAction(name, action, "option 'const' is required")
      }
      return Object.freeze({
        name,
        help,
        action: "store_const",
        const: deepFreeze(options.const),
        required: false,
        default: slotOf(deepFreeze(options.default)),
      } satisfies StoreConstItemSpec)
    case "store_true":
    case "store_false": {
      const flag = options.action === "store_true"

      return Object.freeze({
        name,
        help,
        action: options.action,
        const: flag,
        required: false,
        default: options.default === undefined ? present(!flag) : present(deepFreeze(options.default)),
      } satisfies StoreConstItemSpec)
    }
    case "count":
      return Object.freeze({
        name,
        help,
        action: "count",
        required: options.required ?? false,
        default: slotOf(options.default),
      } satisfies CountItemSpec)
    default:
      throw ConfigError.unsupportedAction(name, action, "unknown action")
  }
}
