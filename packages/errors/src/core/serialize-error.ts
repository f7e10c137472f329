import type { SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * - AppError values keep their code, context and flags
 * - Other Error instances get code "unknown" and are marked non-operational
 * - Non-Error thrown values are wrapped, with the value kept in context
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (isAppError(err)) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isRetryable: false,
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
