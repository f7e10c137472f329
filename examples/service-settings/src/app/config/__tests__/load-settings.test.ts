import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigError } from "@stratum/config"
import { Command } from "commander"
import { loadSettings } from "../load-settings"

function quietCommand(): Command {
  return new Command()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} })
}

async function errorOf(promise: Promise<unknown>): Promise<ConfigError> {
  const err = await promise.then(
    () => undefined,
    (reason: unknown) => reason,
  )

  if (!(err instanceof ConfigError)) throw new Error("expected a ConfigError")
  return err
}

describe("loadSettings", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "service-settings-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("layers settings.json, .env and the command line", async () => {
    await fs.writeFile(
      path.join(cwd, "settings.json"),
      JSON.stringify({ service_name: "billing", port: 8080, log_level: "debug" }),
    )
    await fs.writeFile(path.join(cwd, ".env"), "port=9090\nhost=127.0.0.1\ninclude=from-dotenv\n")

    const { settings, values } = await loadSettings({
      argv: ["node", "svc", "--include", "extra", "--verbose", "--log-pretty"],
      cwd,
      command: quietCommand(),
    })

    expect(settings).toEqual({
      service_name: "billing",
      host: "127.0.0.1",
      port: 9090,
      log_level: "debug",
      log_pretty: true,
      include: ["base", "extra"],
      verbose: 1,
    })
    expect(values.explain("service_name")).toBe("json:settings.json")
    expect(values.explain("port")).toBe("dotenv:.env")
    expect(values.explain("include")).toBe("command-line")
  })

  it("falls back to item defaults without any files", async () => {
    const { settings, values } = await loadSettings({
      argv: ["node", "svc", "--service-name", "billing"],
      cwd,
      command: quietCommand(),
    })

    expect(settings).toEqual({
      service_name: "billing",
      host: "0.0.0.0",
      port: 4663,
      log_level: "info",
      log_pretty: false,
      include: ["base"],
      verbose: 0,
    })
    expect(values.sourcesUsed()).toEqual(["command-line", "default"])
  })

  it("requires a service name", async () => {
    const err = await errorOf(loadSettings({ argv: ["node", "svc"], cwd, command: quietCommand() }))

    expect(err.code).toBe("required_value_missing")
    expect(err.context).toEqual({ item: "service_name" })
  })

  it("rejects a port out of range", async () => {
    const err = await errorOf(
      loadSettings({
        argv: ["node", "svc", "--service-name", "billing", "--port", "70000"],
        cwd,
        command: quietCommand(),
      }),
    )

    expect(err.code).toBe("invalid_value")
    expect(err.context).toEqual({ item: "port", value: "70000" })
  })

  it("rejects an unknown log level", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "service_name=billing\nlog_level=loud\n")

    const err = await errorOf(loadSettings({ argv: ["node", "svc"], cwd, command: quietCommand() }))

    expect(err.code).toBe("invalid_choice")
    expect(err.message).toBe(
      "invalid choice 'loud' for config item 'log_level'; valid choices are (trace,debug,info,warn,error,fatal)",
    )
  })
})
