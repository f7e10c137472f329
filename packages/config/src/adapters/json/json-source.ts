import fs from "node:fs/promises"
import path from "node:path"
import type { Readable } from "node:stream"
import { text } from "node:stream/consumers"
import { ConfigError } from "../../core/errors"
import { batchFromMapping } from "../../core/raw-batch"
import { isNotFound } from "../../core/utils/is-not-found"
import { isRecord } from "../../core/utils/is-record"
import type { ItemSpec } from "../../ports/item"
import type { ConfigSource, RawValuesBatch } from "../../ports/source"

/**
 * Options for creating a JSON configuration source.
 *
 * Exactly one of `file` and `stream` must be given.
 */
export type JsonSourceOptions = {
  /**
   * Path to the JSON file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "settings.json", "./config/app.json"
   */
  file?: string

  /** An already-open stream; consumed on the first `load()` */
  stream?: Readable

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

  /** @default "json:<file>" or "json:stream" */
  name?: string
}

/**
 * Reads a single top-level JSON object and treats it as a flat mapping.
 * Nested values are handed to the item's coercion as they are.
 *
 * The document is read on the first `load()` and kept once it parses.
 * A failed read is not kept, so the next `load()` tries again.
 */
export class JsonSource implements ConfigSource {
  readonly name: string
  private document: Promise<Readonly<Record<string, unknown>>> | undefined

  constructor(
    private readonly items: readonly ItemSpec[],
    private readonly opts: JsonSourceOptions,
  ) {
    this.name = opts.name ?? `json:${opts.file ?? "stream"}`

    if ((opts.file === undefined) === (opts.stream === undefined)) {
      throw ConfigError.invalidSource(this.name, "exactly one of 'file' and 'stream' must be given")
    }
  }

  async load(): Promise<RawValuesBatch> {
    this.document ??= this.read().catch((err: unknown) => {
      this.document = undefined
      throw err
    })

    return batchFromMapping(this.items, await this.document)
  }

  private async read(): Promise<Readonly<Record<string, unknown>>> {
    const content = await this.readText()
    if (content === undefined) return {}

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw ConfigError.sourceLoadFailed(this.name, err)
    }

    if (!isRecord(parsed)) {
      throw ConfigError.invalidDocument(this.name, Array.isArray(parsed) ? "array" : typeof parsed)
    }

    return parsed
  }

  private async readText(): Promise<string | undefined> {
    const { file, stream } = this.opts

    try {
      if (stream) return await text(stream)

      const filePath = path.resolve(this.opts.cwd ?? process.cwd(), file ?? "")
      return await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (this.opts.required === false && isNotFound(err)) {
        return undefined
      }
      throw ConfigError.sourceLoadFailed(this.name, err)
    }
  }
}
