import { isDeepStrictEqual } from "node:util"
import type { IValueStore } from "../ports/value-store"
import { deepFreeze } from "./utils/deep-freeze"

export class ValueStore implements IValueStore {
  private readonly data: Readonly<Record<string, unknown>>

  constructor(
    entries: Iterable<readonly [string, unknown]>,
    private readonly provenance: ReadonlyMap<string, string>,
  ) {
    this.data = deepFreeze(Object.fromEntries(entries))
  }

  get value(): Readonly<Record<string, unknown>> {
    return this.data
  }

  get(name: string): unknown {
    return this.has(name) ? this.data[name] : undefined
  }

  has(name: string): boolean {
    return Object.hasOwn(this.data, name)
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  entries(): [string, unknown][] {
    return Object.entries(this.data)
  }

  explain(name: string): string | undefined {
    return this.provenance.get(name)
  }

  sourcesUsed(): string[] {
    return [...new Set(this.keys().flatMap((name) => this.provenance.get(name) ?? []))]
  }

  equals(other: IValueStore): boolean {
    return isDeepStrictEqual(this.data, other.value)
  }

  toJSON(): Readonly<Record<string, unknown>> {
    return this.data
  }
}
