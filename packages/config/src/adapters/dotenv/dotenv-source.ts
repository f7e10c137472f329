import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { ConfigError } from "../../core/errors"
import { batchFromMapping } from "../../core/raw-batch"
import { isNotFound } from "../../core/utils/is-not-found"
import type { ItemSpec } from "../../ports/item"
import type { ConfigSource, RawValuesBatch } from "../../ports/source"

/**
 * Options for creating a dotenv configuration source.
 */
export type DotenvSourceOptions = {
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/.env.defaults"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Yields no values if file not found.
   *
   * @default true
   */
  required?: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * A flat mapping read from a dotenv-format file. Only the file's own pairs
 * are read; `process.env` is never consulted. Keys are matched against item
 * names exactly.
 *
 * Like `JsonSource`, the file is read on the first `load()` and kept
 * once it parses. A failed read is not kept, so the next `load()` tries again.
 */
export class DotenvSource implements ConfigSource {
  readonly name: string
  private document: Promise<Readonly<Record<string, string>>> | undefined

  constructor(
    private readonly items: readonly ItemSpec[],
    private readonly opts: DotenvSourceOptions,
  ) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<RawValuesBatch> {
    this.document ??= this.read().catch((err: unknown) => {
      this.document = undefined
      throw err
    })

    return batchFromMapping(this.items, await this.document)
  }

  private async read(): Promise<Readonly<Record<string, string>>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      return parse(await fs.readFile(filePath, "utf-8"))
    } catch (err) {
      if (this.opts.required === false && isNotFound(err)) {
        return {}
      }
      throw ConfigError.sourceLoadFailed(this.name, err)
    }
  }
}
