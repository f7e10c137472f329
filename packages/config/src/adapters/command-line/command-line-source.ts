import { Command, Option, type ParseOptions } from "commander"
import { takesValue } from "../../core/raw-batch"
import type { ItemSpec } from "../../ports/item"
import {
  type ConfigSource,
  PRESENT_WITHOUT_VALUE,
  type RawValue,
  type RawValuesBatch,
} from "../../ports/source"

export type CommandLineSourceOptions = {
  /**
   * Arguments to parse, interpreted according to `from`.
   *
   * @default process.argv
   */
  argv?: readonly string[]

  /** @default "node" */
  from?: ParseOptions["from"]

  /**
   * A command to add item flags to, for custom exit and output handling or
   * flags of its own. Flags it already defines are left alone.
   *
   * @default new Command(programName)
   */
  command?: Command

  programName?: string
}

type Collected = readonly RawValue[] | undefined

function collect(value: RawValue, previous: Collected): Collected {
  return [...(previous ?? []), value]
}

function flagFor(item: ItemSpec): string {
  return `--${item.name.replaceAll("_", "-")}`
}

/**
 * One long flag per item, `--<name-with-dashes>`: value-taking for `store`
 * and `append`, presence-only for the const family and `count`. Repeated
 * flags contribute one raw value each, in command-line order.
 *
 * Items whose flag cannot be expressed are skipped and left to other sources:
 * names starting with an underscore or `no_` (commander reads `--no-x` as a
 * negation), names whose flag the command already defines, and names whose
 * option key would collide with an earlier item's.
 *
 * Arguments are parsed on the first `load()`. Unknown flags and missing
 * values are reported by commander itself.
 */
export class CommandLineSource implements ConfigSource {
  readonly name = "command-line"
  readonly command: Command

  private readonly bound = new Map<string, Option>()
  private readonly skipped: string[] = []
  private parsed: Promise<RawValuesBatch> | undefined

  constructor(
    items: readonly ItemSpec[],
    private readonly opts: CommandLineSourceOptions = {},
  ) {
    this.command = opts.command ?? new Command(opts.programName)

    for (const item of items) {
      const option = this.optionFor(item)

      if (option) {
        this.command.addOption(option)
        this.bound.set(item.name, option)
      } else {
        this.skipped.push(item.name)
      }
    }
  }

  /** Names of the items this source has no flag for */
  skippedItems(): readonly string[] {
    return [...this.skipped]
  }

  async load(): Promise<RawValuesBatch> {
    this.parsed ??= this.parse()

    return this.parsed
  }

  private async parse(): Promise<RawValuesBatch> {
    const argv = this.opts.argv ?? process.argv

    await this.command.parseAsync([...argv], { from: this.opts.from ?? "node" })

    const batch = new Map<string, readonly RawValue[]>()

    for (const [name, option] of this.bound) {
      const collected: unknown = this.command.getOptionValue(option.attributeName())

      if (Array.isArray(collected) && collected.length > 0) {
        batch.set(name, collected)
      }
    }

    return batch
  }

  private optionFor(item: ItemSpec): Option | undefined {
    if (!/^[A-Za-z]/.test(item.name) || /^no_/i.test(item.name)) return undefined

    const flag = flagFor(item)
    const option = takesValue(item)
      ? new Option(`${flag} <value>`, item.help).argParser<Collected>(collect)
      : new Option(flag, item.help).argParser<Collected>((_unused, previous) =>
          collect(PRESENT_WITHOUT_VALUE, previous),
        )

    const taken =
      flag === "--help" ||
      this.command.options.some(
        (existing) => existing.long === flag || existing.attributeName() === option.attributeName(),
      )

    return taken ? undefined : option
  }
}
