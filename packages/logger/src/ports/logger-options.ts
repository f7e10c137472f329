import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by every adapter.
 *
 * @remarks
 * Adapters must honour both fields but choose how; the null logger honours
 * them trivially.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Structured JSON otherwise.
   */
  prettify?: boolean
}
