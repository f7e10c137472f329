import { createPinoLogger, type LogLevelName, type Logger } from "@stratum/logger"
import type { DestinationStream } from "pino"
import type { Settings } from "./config/schema"

export function levelFor(settings: Pick<Settings, "log_level" | "verbose">): LogLevelName {
  if (settings.verbose >= 2) return "trace"
  if (settings.verbose === 1) return "debug"

  return settings.log_level
}

export function createLogger(settings: Settings, destination?: DestinationStream): Logger {
  return createPinoLogger(
    { destination },
    { level: levelFor(settings), prettify: settings.log_pretty },
    { component: settings.service_name },
  )
}
