import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One written log line: its level, message and every other field. */
export type CapturedLine = {
  level: LogLevelName
  msg: string
  fields: Record<string, unknown>
}

/** A logger whose output the contract can read back. */
export type CapturingLogger = {
  logger: Logger
  lines: () => CapturedLine[]
  reset: () => void
}

export type LoggerHarness = {
  name: string
  create: (level?: LogLevelName) => CapturingLogger
}

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds its own", () => {
      const { logger, lines } = h.create("trace")

      logger.child({ app: "billing" }).child({ phase: "starting" }).info("hello")

      const logs = lines()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.fields).toMatchObject({ app: "billing", phase: "starting" })
    })

    it("child() overrides on key conflict", () => {
      const { logger, lines } = h.create("trace")

      logger.child({ phase: "starting" }).child({ phase: "running" }).info("hello")

      expect(lines()[0]?.fields.phase).toBe("running")
    })

    it("child() does not mutate the parent", () => {
      const { logger, lines } = h.create("trace")

      const parent = logger.child({ app: "billing" })
      const child = parent.child({ hook: "warm-cache" })

      parent.info("parent")
      child.info("child")

      const logs = lines()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.fields).not.toHaveProperty("hook")
      expect(logs[1]?.fields).toMatchObject({ app: "billing", hook: "warm-cache" })
    })

    it("per-call meta is included in the entry", () => {
      const { logger, lines } = h.create("trace")

      logger.child({ app: "billing" }).info("bound", { prefix: "billing.db" })

      expect(lines()[0]?.fields).toMatchObject({ app: "billing", prefix: "billing.db" })
    })

    it("suppresses entries below the configured level", () => {
      const { logger, lines } = h.create("warn")

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(lines().map((l) => l.level)).toEqual(["warn", "error"])
    })

    it("scopes a hook's lines by application, phase and hook", () => {
      const { logger, lines } = h.create("trace")

      const scoped = logger.child({ app: "billing", phase: "contextLoaded" }).child({ hook: "migrate" })
      scoped.error('startup hook "migrate" failed', { durationMs: 12 })

      expect(lines()).toEqual([
        {
          level: "error",
          msg: 'startup hook "migrate" failed',
          fields: expect.objectContaining({ app: "billing", phase: "contextLoaded", hook: "migrate", durationMs: 12 }),
        },
      ])
    })

    it("reset() empties the captured lines", () => {
      const { logger, lines, reset } = h.create("trace")

      logger.info("one")
      reset()

      expect(lines()).toEqual([])
    })
  })
}
