import {
  DuplicateSpecError,
  defineBinding,
  ObjectSource,
  fields,
  type PropertySource,
  UnknownFieldError,
} from "@bootkit/config"
import type { Logger } from "@bootkit/logger"
import { mock } from "vitest-mock-extended"
import { z } from "zod"
import { FakeTime } from "../../adapters/time/fake-time"
import type { ApplicationContext } from "../../ports/application"
import type { PhaseEvent } from "../../ports/observer"
import type { Mock } from "../../tests/mock"
import { Application, createApplication, defaultCollaborators } from "../application"
import { HookFailedError, HookTimeoutError, LifecycleStateError } from "../errors"
import { type ApplicationOptions, resolveOptions } from "../options"
import { phaseObserver } from "../phase-observer"
import type { SignalHandlerContext } from "../signals"

const DataSource = defineBinding({
  prefix: "app.datasource",
  schema: z.object({
    url: z.string(),
    maxPoolSize: fields.int().default(10),
  }),
  ignoreUnknownFields: false,
})

describe("Application", () => {
  let logger: Mock<Logger>
  let time: FakeTime
  let events: PhaseEvent[]

  beforeEach(() => {
    logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
    time = new FakeTime(1_000)
    events = []
  })

  function recordPhases() {
    return phaseObserver((event) => void events.push(event))
  }

  function phases(): string[] {
    return events.map((event) => event.phase)
  }

  function create(overrides: Partial<ApplicationOptions> = {}): Application {
    return createApplication(
      { logger, time },
      {
        name: "orders",
        sources: [
          new ObjectSource({ app: { datasource: { url: "postgres://db.test/orders", "max-pool-size": 4 } } }),
        ],
        properties: [DataSource],
        observers: [recordPhases()],
        ...overrides,
      },
    )
  }

  describe("successful run", () => {
    it("fires every phase in order and ends done", async () => {
      const app = create()

      await app.run()

      expect(phases()).toStrictEqual([
        "starting",
        "environmentPrepared",
        "contextPrepared",
        "contextLoaded",
        "started",
        "running",
      ])
      expect(app.history()).toStrictEqual(phases())
      expect(app.state).toBe("done")
    })

    it("binds registered properties onto the context", async () => {
      const handle = await create().run()

      expect(handle.context.name).toBe("orders")
      expect(handle.context.properties.get(DataSource)).toStrictEqual({
        url: "postgres://db.test/orders",
        maxPoolSize: 4,
      })
    })

    it("exposes loaded configuration on the environment", async () => {
      const handle = await create().run()

      expect(handle.context.environment.source.get("app.datasource.url")).toBe("postgres://db.test/orders")
    })

    it("has no bound properties when the context is prepared", async () => {
      const seen: boolean[] = []
      const app = create({
        observers: [
          {
            contextPrepared: (context) => void seen.push(context.properties.has(DataSource)),
            contextLoaded: (context) => void seen.push(context.properties.has(DataSource)),
          },
        ],
      })

      await app.run()

      expect(seen).toStrictEqual([false, true])
    })

    it("names the application in its logger", async () => {
      await create().run()

      expect(logger.child).toHaveBeenCalledWith({ app: "orders" })
    })

    it("logs the startup duration", async () => {
      const app = create({
        startHooks: [{ name: "warm-up", fn: async () => time.advance(42) }],
      })

      await app.run()

      expect(logger.info).toHaveBeenCalledWith("Started orders in 42 ms", { durationMs: 42 })
    })

    it("calls runners in order between started and running", async () => {
      const order: string[] = []
      const app = create({
        observers: [
          {
            started: () => void order.push("started"),
            running: () => void order.push("running"),
          },
        ],
        runners: [
          { name: "first", run: () => void order.push("first") },
          {
            name: "second",
            run: async (context: ApplicationContext) => void order.push(`second:${context.name}`),
          },
        ],
      })

      await app.run()

      expect(order).toStrictEqual(["started", "first", "second:orders", "running"])
    })

    it("passes the context to start hooks", async () => {
      let hookContext: ApplicationContext | undefined
      const app = create({
        startHooks: [
          {
            name: "capture",
            fn: async ({ context }) => {
              hookContext = context
            },
          },
        ],
      })

      const handle = await app.run()

      expect(hookContext).toBe(handle.context)
    })
  })

  describe("failed run", () => {
    it("reports failed after contextPrepared when binding fails and rethrows", async () => {
      const app = create({
        sources: [new ObjectSource({ app: { datasource: { url: "postgres://db.test/orders", "user-name": "sa" } } })],
      })

      await expect(app.run()).rejects.toBeInstanceOf(UnknownFieldError)

      expect(phases()).toStrictEqual(["starting", "environmentPrepared", "contextPrepared", "failed"])
      expect(app.state).toBe("failed")
    })

    it("gives the failed observer the context and the error", async () => {
      const app = create({
        sources: [new ObjectSource({ app: { datasource: { "max-pool-size": "lots" } } })],
      })

      const error = await app.run().catch((err: unknown) => err)
      const failed = events.at(-1)

      expect(failed).toStrictEqual({ phase: "failed", context: expect.objectContaining({ name: "orders" }), error })
    })

    it("logs the failure analysis", async () => {
      const app = create({
        sources: [new ObjectSource({ app: { datasource: { "user-name": "sa" } } }, "object:test")],
      })

      const error = await app.run().catch((err: unknown) => err)

      expect(logger.error).toHaveBeenCalledWith(
        'Application run failed: The configuration key "app.datasource.user-name" (from object:test) ' +
          'does not match any field under prefix "app.datasource".',
        {
          err: error,
          action: 'Remove "app.datasource.user-name" or correct its spelling, or allow unknown fields for this binding.',
        },
      )
    })

    it("reports failed without a context when loading configuration fails", async () => {
      const error = new Error("unreadable")
      const broken: PropertySource = {
        name: "broken",
        load: () => Promise.reject(error),
      }
      const app = create({ sources: [broken] })

      await expect(app.run()).rejects.toBe(error)

      expect(events).toStrictEqual([
        { phase: "starting" },
        { phase: "failed", context: undefined, error },
      ])
    })

    it("wraps a failing start hook in HookFailedError", async () => {
      const cause = new Error("db down")
      const app = create({
        startHooks: [
          {
            name: "migrate",
            fn: async () => {
              throw cause
            },
          },
        ],
      })

      const error = await app.run().catch((err: unknown) => err)

      expect(error).toBeInstanceOf(HookFailedError)
      expect(error).toMatchObject({ hook: "migrate", phase: "startup", cause })
      expect(phases()).toStrictEqual([
        "starting",
        "environmentPrepared",
        "contextPrepared",
        "contextLoaded",
        "failed",
      ])
    })

    it("throws HookTimeoutError when start hooks run past the timeout", async () => {
      const app = create({
        startupTimeoutMs: 0,
        startHooks: [{ name: "slow", fn: async () => {} }],
      })

      await expect(app.run()).rejects.toBeInstanceOf(HookTimeoutError)
    })

    it("fails with HookTimeoutError when a start hook never settles", async () => {
      const app = create({
        startupTimeoutMs: 50,
        startHooks: [{ name: "stuck", fn: () => new Promise<void>(() => {}) }],
      })

      const error = await app.run().catch((err: unknown) => err)

      expect(error).toBeInstanceOf(HookTimeoutError)
      expect(error).toMatchObject({ phase: "startup" })
      expect(phases().at(-1)).toBe("failed")
      expect(app.state).toBe("failed")
    })

    it("reports failed when a runner throws", async () => {
      const error = new Error("runner broke")
      const app = create({
        runners: [
          {
            name: "broken",
            run: () => {
              throw error
            },
          },
        ],
      })

      await expect(app.run()).rejects.toBe(error)

      expect(phases().slice(-2)).toStrictEqual(["started", "failed"])
    })

    it("reports failed when a running observer throws", async () => {
      const error = new Error("observer broke")
      const app = create({
        observers: [
          recordPhases(),
          {
            running: () => {
              throw error
            },
          },
        ],
      })

      await expect(app.run()).rejects.toBe(error)

      expect(app.history().slice(-2)).toStrictEqual(["running", "failed"])
    })

    it("rethrows the original error when a failed observer throws", async () => {
      const error = new Error("runner broke")
      const observerError = new Error("observer broke")
      const app = create({
        runners: [
          {
            name: "broken",
            run: () => {
              throw error
            },
          },
        ],
        observers: [
          {
            failed: () => {
              throw observerError
            },
          },
        ],
      })

      await expect(app.run()).rejects.toBe(error)

      expect(logger.warn).toHaveBeenCalledWith("A lifecycle observer threw while handling a failed run", {
        err: observerError,
      })
    })
  })

  describe("run once", () => {
    it("rejects a second run", async () => {
      const app = create()

      await app.run()

      await expect(app.run()).rejects.toThrow('Cannot move the run from "done" to "starting"')
      expect(app.state).toBe("done")
    })

    it("rejects a run after a failure", async () => {
      const app = create({ sources: [new ObjectSource({ app: { datasource: { typo: "x" } } })] })

      await app.run().catch(() => undefined)

      await expect(app.run()).rejects.toBeInstanceOf(LifecycleStateError)
    })
  })

  describe("registration", () => {
    it("rejects two bindings with the same name", () => {
      const again = defineBinding({ prefix: "app.datasource", schema: z.object({ url: z.string() }) })

      expect(() => create({ properties: [DataSource, again] })).toThrow(DuplicateSpecError)
    })
  })

  describe("stop", () => {
    it("runs the stop hooks once", async () => {
      const stopHook = vi.fn(async () => {})
      const handle = await create({ stopHooks: [{ name: "close-pool", fn: stopHook }] }).run()

      const first = await handle.stop()
      const second = await handle.stop()

      expect(first).toStrictEqual({ ok: true, failures: [], timedOut: false })
      expect(second).toBe(first)
      expect(stopHook).toHaveBeenCalledOnce()
    })
  })

  describe("setupProcessHandlers", () => {
    function createWithHandlers(options: Partial<ApplicationOptions> = {}) {
      const unregister = vi.fn()
      let signalCtx: SignalHandlerContext | undefined
      const setupProcessHandlers = vi.fn((ctx: SignalHandlerContext) => {
        signalCtx = ctx
        return { unregister }
      })

      const app = new Application(
        { logger, time },
        resolveOptions({ name: "orders", sources: [], ...options }),
        { ...defaultCollaborators, setupProcessHandlers },
      )

      return { app, unregister, setupProcessHandlers, stop: () => signalCtx?.stop?.() }
    }

    it("installs the handlers once and returns the application", () => {
      const { app, setupProcessHandlers } = createWithHandlers()

      expect(app.setupProcessHandlers().setupProcessHandlers()).toBe(app)
      expect(setupProcessHandlers).toHaveBeenCalledOnce()
    })

    it("warns when a signal arrives before the application runs", async () => {
      const { app, stop } = createWithHandlers()

      app.setupProcessHandlers()
      const result = await stop()

      expect(result).toStrictEqual({ ok: true, failures: [], timedOut: false })
      expect(logger.warn).toHaveBeenCalledWith("Stop called but application not running")
    })

    it("stops the running application and unregisters the handlers", async () => {
      const stopHook = vi.fn(async () => {})
      const { app, stop, unregister } = createWithHandlers({
        stopHooks: [{ name: "close", fn: stopHook }],
      })

      app.setupProcessHandlers()
      await app.run()
      await stop()

      expect(stopHook).toHaveBeenCalledOnce()
      expect(unregister).toHaveBeenCalledOnce()
    })
  })
})
