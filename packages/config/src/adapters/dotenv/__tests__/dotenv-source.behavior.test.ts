import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { defineItem } from "../../../core/item/define-item"
import { configErrorOf } from "../../../tests/utils/config-error-of"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  const items = [
    defineItem("port", {}),
    defineItem("host", {}),
    defineItem("single", {}),
    defineItem("double", {}),
  ]

  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await fs.rm(cwd, { recursive: true })
  })

  it("reads key=value pairs for known items", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "port=3000\nhost=localhost\nDEBUG=true")

    const source = new DotenvSource(items, { file: ".env", cwd })

    expect(Object.fromEntries(await source.load())).toEqual({
      port: ["3000"],
      host: ["localhost"],
    })
  })

  it("handles quoted values", async () => {
    await fs.writeFile(path.join(cwd, ".env"), `single='single quoted'\ndouble="double quoted"`)

    const source = new DotenvSource(items, { file: ".env", cwd })

    expect(Object.fromEntries(await source.load())).toEqual({
      single: ["single quoted"],
      double: ["double quoted"],
    })
  })

  it("ignores comments", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "# comment\nport=3000\n# host=example\n")

    const source = new DotenvSource(items, { file: ".env", cwd })

    expect(Object.fromEntries(await source.load())).toEqual({ port: ["3000"] })
  })

  it("never reads the process environment", async () => {
    vi.stubEnv("host", "from-environment")
    await fs.writeFile(path.join(cwd, ".env"), "port=3000\n")

    const source = new DotenvSource(items, { file: ".env", cwd })

    expect((await source.load()).has("host")).toBe(false)
  })

  it("reads the file only once", async () => {
    const file = path.join(cwd, ".env")
    await fs.writeFile(file, "port=1\n")

    const source = new DotenvSource(items, { file: ".env", cwd })
    await source.load()
    await fs.writeFile(file, "port=2\n")

    expect(Object.fromEntries(await source.load())).toEqual({ port: ["1"] })
  })

  it("reads again after a failed load", async () => {
    const source = new DotenvSource(items, { file: ".env", cwd })
    await expect(source.load()).rejects.toThrow("dotenv:.env: failed to load")

    await fs.writeFile(path.join(cwd, ".env"), "port=3000\n")

    expect(Object.fromEntries(await source.load())).toEqual({ port: ["3000"] })
  })

  it("yields nothing when the file is missing and not required", async () => {
    const source = new DotenvSource(items, { file: ".env", required: false, cwd })

    expect((await source.load()).size).toBe(0)
  })

  it("fails when the file is missing and required", async () => {
    const source = new DotenvSource(items, { file: ".env", cwd })
    const err = await configErrorOf(() => source.load())

    expect(err.code).toBe("source_load_failed")
    expect(err.context).toEqual({ source: "dotenv:.env" })
  })
})
