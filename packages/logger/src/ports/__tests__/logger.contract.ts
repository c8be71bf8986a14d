import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("stamps bindings on every line", () => {
      const { logger, read } = h.make({
        level: "trace",
        bindings: { module: "sqlite-bytes-store", path: "/tmp/cache.db" },
      })

      logger.debug("Schema ready", { operation: "open" })
      logger.warn("Timed out waiting for key lock", { key: "k:1", operation: "set" })

      expect(read().map((l) => l.payload)).toMatchObject([
        {
          msg: "Schema ready",
          module: "sqlite-bytes-store",
          path: "/tmp/cache.db",
          operation: "open",
        },
        {
          msg: "Timed out waiting for key lock",
          module: "sqlite-bytes-store",
          path: "/tmp/cache.db",
          key: "k:1",
          operation: "set",
        },
      ])
    })

    it("child() inherits parent context and adds its own", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ path: "/tmp/cache.db" })
      const child = parent.child({ key: "k:1" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ path: "/tmp/cache.db", key: "k:1" })
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ operation: "get" }).child({ operation: "set" })

      child.info("hello")

      expect(read()[0]?.payload.operation).toBe("set")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ path: "/tmp/a.db" })
      const child = parent.child({ key: "k:1" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("key")
      expect(logs[1]?.payload).toMatchObject({ path: "/tmp/a.db", key: "k:1" })

      clear()
      expect(read()).toHaveLength(0)
    })

    it("per-call meta overrides context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ key: "k:1" }).info("hello", { key: "k:2" })

      expect(read()[0]?.payload.key).toBe("k:2")
    })

    it("suppresses entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
