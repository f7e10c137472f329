import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { Writable } from "node:stream"
import { Command } from "commander"
import { levelFor } from "../app/create-logger"
import { run } from "../run"

type Line = { level: number; msg: string } & Record<string, unknown>

function capture() {
  const lines: Line[] = []
  const destination = new Writable({
    write(chunk, _encoding, cb) {
      lines.push(JSON.parse(String(chunk)))
      cb()
    },
  })

  return { lines, destination }
}

function quietCommand(): Command {
  return new Command()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} })
}

describe("run", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "service-run-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("logs the resolved settings and exits with 0", async () => {
    const { lines, destination } = capture()

    const code = await run(["node", "svc", "--service-name", "billing"], {
      cwd,
      destination,
      command: quietCommand(),
    })

    const loaded = lines.find((line) => line.msg === "settings loaded")

    expect(code).toBe(0)
    expect(loaded?.component).toBe("billing")
    expect(loaded?.sources).toEqual(["command-line", "default"])
    expect(loaded?.settings).toMatchObject({ service_name: "billing", port: 4663 })
  })

  it("logs one line per setting at debug level with --verbose", async () => {
    const { lines, destination } = capture()

    await run(["node", "svc", "--service-name", "billing", "--verbose"], {
      cwd,
      destination,
      command: quietCommand(),
    })

    const settingLines = lines.filter((line) => line.msg === "setting")

    expect(settingLines.map((line) => [line.item, line.source])).toEqual([
      ["service_name", "command-line"],
      ["host", "default"],
      ["port", "default"],
      ["log_level", "default"],
      ["log_pretty", "default"],
      ["include", "default"],
      ["verbose", "command-line"],
    ])
  })

  it("reports invalid settings and exits with 1", async () => {
    const { lines, destination } = capture()

    const code = await run(["node", "svc"], { cwd, destination, command: quietCommand() })

    const reported = lines.find((line) => line.msg === "invalid settings")

    expect(code).toBe(1)
    expect(reported?.err).toMatchObject({
      type: "ConfigError",
      message: "Did not find value for config item 'service_name'",
    })
  })

  it("rethrows errors that are not about the settings", async () => {
    const { destination } = capture()

    await expect(
      run(["node", "svc", "--nope"], { cwd, destination, command: quietCommand() }),
    ).rejects.toThrow(
      "unknown option '--nope'",
    )
  })
})

describe("levelFor", () => {
  it.each([
    [0, "warn", "warn"],
    [1, "warn", "debug"],
    [2, "warn", "trace"],
    [5, "info", "trace"],
  ] as const)("verbose %i with log_level %s gives %s", (verbose, logLevel, expected) => {
    expect(levelFor({ verbose, log_level: logLevel })).toBe(expected)
  })
})
