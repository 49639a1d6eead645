import type { Logger } from "@bootkit/logger"
import type { ApplicationContext } from "../../ports/application"
import type { HookFailure, LifecycleHook } from "../../ports/lifecycle-hook"
import type { Milliseconds, TimeSource } from "../../ports/time-source"
import type { HookPhase } from "../errors"

export type RunHooksContext = {
  phase: HookPhase
  time: TimeSource
  logger: Logger
  /** Absolute time, read from `time`, by which the whole phase must finish. */
  deadlineMs: Milliseconds
  context: ApplicationContext
}

export type RunHooksPolicy = {
  /** Stop at the first failing hook; startup runs this way. */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

type HookOutcome =
  | { status: "completed" }
  | { status: "failed"; error: unknown }
  | { status: "expired"; error?: unknown }

/**
 * Runs `hooks` one after another inside the phase budget.
 *
 * A hook that is still running at the deadline is abandoned: its signal is
 * aborted and the phase ends timed out, whether or not the hook listens.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const [position, hook] of hooks.entries()) {
    const budgetMs = ctx.deadlineMs - ctx.time.nowMs()

    if (budgetMs <= 0) {
      const skipped = hooks.slice(position).map((h) => h.name)
      ctx.logger.warn(`No time left for ${ctx.phase} hooks`, { skipped })
      return { failures, timedOut: true }
    }

    const outcome = await runWithin(ctx, hook, budgetMs)

    if (outcome.status !== "completed" && outcome.error !== undefined) {
      failures.push({ hook: hook.name, error: outcome.error })
    }

    if (outcome.status === "expired") return { failures, timedOut: true }
    if (outcome.status === "failed" && policy.failFast) return { failures, timedOut: false }
  }

  return { failures, timedOut: false }
}

async function runWithin(ctx: RunHooksContext, hook: LifecycleHook, budgetMs: Milliseconds): Promise<HookOutcome> {
  const { logger, phase } = ctx
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), budgetMs)

  const expired = new Promise<HookOutcome>((resolve) => {
    controller.signal.addEventListener("abort", () => resolve({ status: "expired" }), { once: true })
  })
  const settled = Promise.resolve()
    .then(() => hook.fn({ signal: controller.signal, timeRemainingMs: budgetMs, context: ctx.context }))
    .then(
      (): HookOutcome => ({ status: "completed" }),
      (error: unknown): HookOutcome => ({ status: "failed", error }),
    )

  let outcome: HookOutcome
  try {
    outcome = await Promise.race([settled, expired])
  } finally {
    clearTimeout(timer)
  }

  // The time source may have moved past the deadline while the hook ran.
  if (outcome.status !== "expired" && ctx.time.nowMs() >= ctx.deadlineMs) {
    outcome = { status: "expired", error: outcome.status === "failed" ? outcome.error : undefined }
  }

  switch (outcome.status) {
    case "completed":
      logger.info(`${phase} hook "${hook.name}" completed`, { hook: hook.name })
      break
    case "failed":
      logger.error(`${phase} hook "${hook.name}" failed`, { hook: hook.name, err: outcome.error })
      break
    case "expired":
      logger.warn(`${phase} hook "${hook.name}" ran past the ${phase} deadline`, {
        hook: hook.name,
        budgetMs,
        err: outcome.error,
      })
      break
  }

  return outcome
}
