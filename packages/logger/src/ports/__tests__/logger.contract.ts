import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "config" })
      const child = parent.child({ file: "/etc/strata/base.yaml" })

      child.debug("opening file")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        module: "config",
        file: "/etc/strata/base.yaml",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "config" })
      const child = parent.child({ module: "include" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.module).toBe("include")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ module: "defaults" })
      const child = parent.child({ kind: "registry" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ module: "defaults" })
      expect(logs[0]?.payload).not.toHaveProperty("kind")
      expect(logs[1]?.payload).toMatchObject({ module: "defaults", kind: "registry" })

      clear()
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const scoped = logger.child({ keyPath: ".a.b" })
      scoped.info("hello", { keyPath: ".a.c" })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.keyPath).toBe(".a.c")
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })
  })
}
