import { isAppError } from "@stratum/errors"
import { createPinoLogger } from "@stratum/logger"
import type { Command } from "commander"
import type { DestinationStream } from "pino"
import { loadSettings } from "./app/config/load-settings"
import { createLogger } from "./app/create-logger"

export type RunDeps = {
  cwd?: string
  destination?: DestinationStream
  command?: Command
}

/**
 * Resolves the settings and logs them with their provenance.
 *
 * @returns The process exit code
 */
export async function run(argv: readonly string[], deps: RunDeps = {}): Promise<number> {
  const bootstrap = createPinoLogger({ destination: deps.destination }, { level: "warn" })

  try {
    const { settings, values } = await loadSettings({
      argv,
      cwd: deps.cwd,
      logger: bootstrap,
      command: deps.command,
    })
    const logger = createLogger(settings, deps.destination)

    logger.info("settings loaded", { settings: values.value, sources: values.sourcesUsed() })

    for (const name of values.keys()) {
      logger.debug("setting", { item: name, source: values.explain(name) })
    }

    return 0
  } catch (err) {
    if (isAppError(err) && err.isOperational) {
      bootstrap.error("invalid settings", { err })
      return 1
    }
    throw err
  }
}
