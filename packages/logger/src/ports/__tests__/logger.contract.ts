import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ command: "config add" }).child({ profile: "p1" })

      child.info("profile added")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ command: "config add", profile: "p1" })
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ profile: "p1" }).child({ profile: "p2" }).info("hello")

      expect(read()[0]?.payload.profile).toBe("p2")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ command: "config delete" })
      const child = parent.child({ profile: "p1" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("profile")
      expect(logs[1]?.payload).toMatchObject({ command: "config delete", profile: "p1" })
    })

    it("per-call meta overrides context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ profile: "p1" }).info("hello", { profile: "p2" })

      expect(read()[0]?.payload.profile).toBe("p2")
    })

    it("drops entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
