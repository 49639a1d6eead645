import type { Logger } from "@bootkit/logger"
import type { ApplicationContext, StopResult } from "../../ports/application"
import type { LifecycleHook } from "../../ports/lifecycle-hook"
import type { Milliseconds, TimeSource } from "../../ports/time-source"
import { runHooks } from "./run-hooks"

export type StartupContext = {
  time: TimeSource
  logger: Logger
  deadlineMs: Milliseconds
  startHooks: LifecycleHook[]
  context: ApplicationContext
}

export type StartResult = StopResult

export async function startup(ctx: StartupContext): Promise<StartResult> {
  ctx.logger.debug("Running startup hooks...")

  const { failures, timedOut } = await runHooks(
    {
      phase: "startup",
      time: ctx.time,
      logger: ctx.logger,
      deadlineMs: ctx.deadlineMs,
      context: ctx.context,
    },
    ctx.startHooks,
    { failFast: true },
  )

  const ok = failures.length === 0 && !timedOut

  return { ok, failures, timedOut }
}

export type StartupFn = typeof startup
