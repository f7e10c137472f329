import fs from "node:fs"
import path from "node:path"
import type { Readable, Writable } from "node:stream"

export type FileMode = "r" | "w" | "a"

export type FileTypeOptions = {
  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string

  /** @default "utf-8" */
  encoding?: BufferEncoding
}

/**
 * A coercion that opens the raw value as a file path and yields a stream.
 *
 * The file is opened when the value is coerced, so a missing or unwritable
 * file fails the pass with `invalid_value`. `"-"` stands for stdin or stdout.
 *
 * @example
 * ```ts
 * resolver.addItem("input", { type: fileType("r") })
 * resolver.addItem("report", { type: fileType("w") })
 * ```
 */
export function fileType(mode: "r", options?: FileTypeOptions): (raw: unknown) => Readable
export function fileType(mode: "w" | "a", options?: FileTypeOptions): (raw: unknown) => Writable
export function fileType(
  mode: FileMode,
  options: FileTypeOptions = {},
): (raw: unknown) => Readable | Writable {
  const encoding = options.encoding ?? "utf-8"

  return (raw) => {
    if (typeof raw !== "string" || raw === "") {
      throw new TypeError(`expected a file path, got ${typeof raw === "string" ? "an empty string" : typeof raw}`)
    }

    if (raw === "-") return mode === "r" ? process.stdin : process.stdout

    const filePath = path.resolve(options.cwd ?? process.cwd(), raw)
    const fd = fs.openSync(filePath, mode)

    return mode === "r"
      ? fs.createReadStream(filePath, { fd, encoding })
      : fs.createWriteStream(filePath, { fd, encoding })
  }
}
