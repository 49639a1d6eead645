import type { Logger } from "@bootkit/logger"
import type { StopResult } from "../ports/application"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process.exit */
  exit?: (code: number) => void
}

export interface SignalHandler {
  unregister: () => void
}

type Exit = (code: number) => void

const processExit: Exit = (code) => process.exit(code)

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}

async function withForceExit(logger: Logger, ms: number, exit: Exit, fn: () => Promise<void>): Promise<void> {
  const timer = setTimeout(() => {
    logger.fatal("Forced exit after timeout", { timeoutMs: ms })
    exit(1)
  }, ms)

  timer.unref()

  try {
    await fn()
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Registers process handlers that stop the application.
 *
 * SIGINT and SIGTERM stop it gracefully. An uncaught exception or unhandled
 * rejection stops it and exits with code 1, forcing the exit after
 * `fatalTimeoutMs`; a second fatal error while stopping exits at once.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  const exit = ctx.exit ?? processExit
  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      exit(1)
      return
    }
    stopping = true

    ctx.logger.fatal("Fatal error", { reason, err })
    void withForceExit(ctx.logger, fatalTimeoutMs, exit, () => runStop(ctx, reason)).then(() => exit(1))
  }

  const sigintHandler = () => onSignal("SIGINT")
  const sigtermHandler = () => onSignal("SIGTERM")
  const uncaughtHandler = (err: Error) => onFatal("uncaughtException", err)
  const rejectionHandler = (reason: unknown) => onFatal("unhandledRejection", reason)

  process.on("SIGINT", sigintHandler)
  process.on("SIGTERM", sigtermHandler)
  process.on("uncaughtException", uncaughtHandler)
  process.on("unhandledRejection", rejectionHandler)

  return {
    unregister: () => {
      process.off("SIGINT", sigintHandler)
      process.off("SIGTERM", sigtermHandler)
      process.off("uncaughtException", uncaughtHandler)
      process.off("unhandledRejection", rejectionHandler)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers
