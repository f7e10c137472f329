import {
  CommandLineSource,
  ConfigResolver,
  DotenvSource,
  JsonSource,
  type ValueStore,
} from "@stratum/config"
import { type Logger, logLevelNames } from "@stratum/logger"
import type { Command } from "commander"
import { z } from "zod"
import { type Settings, settingsSchema } from "./schema"

export type LoadSettingsOptions = {
  /** @default process.argv */
  argv?: readonly string[]

  /** Directory holding settings.json and .env */
  cwd?: string

  logger?: Logger

  command?: Command
}

export type LoadedSettings = {
  settings: Settings
  values: ValueStore
}

/**
 * Files may set the basic service settings; `include` and `verbose` are
 * registered after the file sources, so only the command line can set them.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<LoadedSettings> {
  const cwd = options.cwd ?? process.cwd()
  const resolver = new ConfigResolver({ logger: options.logger })

  resolver.addItem("service_name", { required: true, help: "name reported in logs" })
  resolver.addItem("host", { default: "0.0.0.0", help: "interface to bind" })
  resolver.addItem("port", {
    type: z.coerce.number().int().min(1).max(65_535),
    default: 4663,
    help: "port to listen on",
  })
  resolver.addItem("log_level", { choices: logLevelNames, default: "info", help: "minimum log level" })
  resolver.addItem("log_pretty", { action: "store_true", help: "human-readable logs" })

  resolver.addSource(JsonSource, { file: "settings.json", required: false, cwd })
  resolver.addSource(DotenvSource, { file: ".env", required: false, cwd })

  resolver.addItem("include", { action: "append", default: ["base"], help: "extra settings profile" })
  resolver.addItem("verbose", { action: "count", default: 0, help: "more logging, repeatable" })

  resolver.addSource(CommandLineSource, { argv: options.argv, command: options.command })

  const values = await resolver.resolve()

  return { settings: settingsSchema.parse(values.value), values }
}
