import { Readable } from "node:stream"
import { deepFreeze } from "../deep-freeze"

describe("deepFreeze", () => {
  it("freezes nested objects and arrays", () => {
    const value = { server: { hosts: ["a", "b"] } }

    expect(deepFreeze(value)).toBe(value)
    expect(Object.isFrozen(value)).toBe(true)
    expect(Object.isFrozen(value.server)).toBe(true)
    expect(Object.isFrozen(value.server.hosts)).toBe(true)
  })

  it("freezes the elements of an already frozen array", () => {
    const inner = { a: 1 }
    deepFreeze(Object.freeze([inner]))

    expect(Object.isFrozen(inner)).toBe(true)
  })

  it("leaves class instances alone", () => {
    const stream = Readable.from([])
    const when = new Date(0)
    deepFreeze({ stream, when })

    expect(Object.isFrozen(stream)).toBe(false)
    expect(Object.isFrozen(when)).toBe(false)
  })

  it("handles cycles", () => {
    const node: { self?: unknown } = {}
    node.self = node

    expect(deepFreeze(node)).toBe(node)
    expect(Object.isFrozen(node)).toBe(true)
  })

  it("returns primitives unchanged", () => {
    expect(deepFreeze(3)).toBe(3)
    expect(deepFreeze(null)).toBeNull()
  })
})
