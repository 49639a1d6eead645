import type { Logger } from "@bootkit/logger"
import type { ApplicationContext, StopResult } from "../../ports/application"
import type { LifecycleHook } from "../../ports/lifecycle-hook"
import type { Milliseconds, TimeSource } from "../../ports/time-source"
import { runHooks } from "./run-hooks"

export type ShutdownContext = {
  time: TimeSource
  logger: Logger
  deadlineMs: Milliseconds
  stopHooks: LifecycleHook[]
  context: ApplicationContext
}

/** Runs every stop hook, even after one fails, until the deadline. */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully...")

  const { failures, timedOut } = await runHooks(
    {
      phase: "shutdown",
      time: ctx.time,
      logger: ctx.logger,
      deadlineMs: ctx.deadlineMs,
      context: ctx.context,
    },
    ctx.stopHooks,
    { failFast: false },
  )

  const ok = failures.length === 0 && !timedOut

  ctx.logger.info("Shutdown complete")

  return { ok, failures, timedOut }
}

export type ShutdownFn = typeof shutdown
