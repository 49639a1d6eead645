import type { Logger } from "@bootkit/logger"
import type { ApplicationContext, ApplicationHandle, StopResult } from "../ports/application"
import type { LifecycleHook } from "../ports/lifecycle-hook"
import type { Milliseconds, TimeSource } from "../ports/time-source"
import type { ShutdownFn } from "./hooks/shutdown"

export interface StopperContext {
  context: ApplicationContext
  time: TimeSource
  logger: Logger
  shutdownTimeoutMs: Milliseconds
  stopHooks: LifecycleHook[]
  shutdown: ShutdownFn
  onStop: () => void
}

export function createStopper(ctx: StopperContext): ApplicationHandle {
  let stopping: Promise<StopResult> | undefined

  return {
    context: ctx.context,
    stop: async () => {
      if (!stopping) {
        stopping = runShutdown(ctx)
      }

      return stopping
    },
  }
}

export type CreateStopperFn = typeof createStopper

async function runShutdown(ctx: StopperContext): Promise<StopResult> {
  try {
    return await ctx.shutdown({
      time: ctx.time,
      logger: ctx.logger,
      deadlineMs: ctx.time.nowMs() + ctx.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
      context: ctx.context,
    })
  } finally {
    ctx.onStop()
  }
}
