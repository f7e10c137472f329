import { BaseError } from "@stratum/errors"
import { formatValue } from "./utils/format-value"

export type ConfigErrorCode =
  | "invalid_name"
  | "invalid_type"
  | "unsupported_action"
  | "duplicate_item"
  | "invalid_choice"
  | "invalid_value"
  | "required_value_missing"
  | "invalid_source"
  | "invalid_document"
  | "source_load_failed"
  | "resolution_in_progress"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalidName(name: unknown, reason: string): ConfigError {
    return new ConfigError(`Invalid config name '${formatValue(name)}': ${reason}`, {
      code: "invalid_name",
      context: { name },
    })
  }

  static invalidType(item: string, type: unknown): ConfigError {
    return new ConfigError(
      `type for config item '${item}' must be a function or a zod schema, got ${typeof type}`,
      { code: "invalid_type", context: { item, type: typeof type }, isOperational: false },
    )
  }

  static unsupportedAction(item: string, action: unknown, reason: string): ConfigError {
    return new ConfigError(`${reason} (config item '${item}', action '${formatValue(action)}')`, {
      code: "unsupported_action",
      context: { item, action },
      isOperational: false,
    })
  }

  static duplicateItem(item: string): ConfigError {
    return new ConfigError(`config item '${item}' is already defined`, {
      code: "duplicate_item",
      context: { item },
      isOperational: false,
    })
  }

  static invalidChoice(item: string, value: unknown, choices: readonly unknown[]): ConfigError {
    const valid = choices.map(formatValue).join(",")

    return new ConfigError(
      `invalid choice '${formatValue(value)}' for config item '${item}'; valid choices are (${valid})`,
      { code: "invalid_choice", context: { item, value, choices } },
    )
  }

  static invalidValue(item: string, raw: unknown, cause: unknown): ConfigError {
    const detail = cause instanceof Error ? `: ${cause.message}` : ""

    return new ConfigError(
      `invalid value '${formatValue(raw)}' for config item '${item}'${detail}`,
      { code: "invalid_value", context: { item, value: raw }, cause },
    )
  }

  static requiredValueMissing(item: string): ConfigError {
    return new ConfigError(`Did not find value for config item '${item}'`, {
      code: "required_value_missing",
      context: { item },
    })
  }

  static invalidSource(source: string, reason: string): ConfigError {
    return new ConfigError(`${source}: ${reason}`, {
      code: "invalid_source",
      context: { source },
      isOperational: false,
    })
  }

  static invalidDocument(source: string, found: string): ConfigError {
    return new ConfigError(`${source}: expected a JSON object at the top level, got ${found}`, {
      code: "invalid_document",
      context: { source, found },
    })
  }

  static sourceLoadFailed(source: string, cause: unknown): ConfigError {
    const detail = cause instanceof Error ? `: ${cause.message}` : ""

    return new ConfigError(`${source}: failed to load${detail}`, {
      code: "source_load_failed",
      context: { source },
      cause,
    })
  }

  static resolutionInProgress(operation: string): ConfigError {
    return new ConfigError(`cannot ${operation} while a resolution pass is running`, {
      code: "resolution_in_progress",
      context: { operation },
      isOperational: false,
    })
  }
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError
}
