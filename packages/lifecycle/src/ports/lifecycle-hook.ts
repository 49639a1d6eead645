import type { ApplicationContext } from "./application"
import type { Milliseconds } from "./time-source"

export interface LifecycleHookContext {
  signal: AbortSignal
  timeRemainingMs: Milliseconds
  context: ApplicationContext
}

export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export interface HookFailure {
  hook: string
  error: unknown
}

/** Runs once the application has started, before it is reported running. */
export interface ApplicationRunner {
  name: string
  run: (context: ApplicationContext) => Promise<void> | void
}
