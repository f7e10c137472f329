import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ component: "resolver" }).child({ source: "json:a.json" })

      child.info("pulled source")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        component: "resolver",
        source: "json:a.json",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ source: "object" }).child({ source: "command-line" })

      child.info("pulled source")

      expect(read()[0]?.payload.source).toBe("command-line")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ component: "resolver" })
      const child = parent.child({ item: "port" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ component: "resolver" })
      expect(logs[0]?.payload).not.toHaveProperty("item")
      expect(logs[1]?.payload).toMatchObject({ component: "resolver", item: "port" })

      clear()
      expect(read()).toEqual([])
    })

    it("per-call meta merges with context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ component: "resolver" }).info("pass complete", { pass: 2, items: 3 })

      expect(read()[0]?.payload).toMatchObject({ component: "resolver", pass: 2, items: 3 })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")
      logger.fatal("fatal")

      expect(read().map((l) => l.level)).toEqual(["warn", "error", "fatal"])
    })
  })
}
