import type { BoundProperties, ConfigSource } from "@bootkit/config"
import type { Logger } from "@bootkit/logger"
import type { HookFailure } from "./lifecycle-hook"

export interface ApplicationEnvironment {
  readonly source: ConfigSource
}

export interface ApplicationContext {
  readonly name: string
  readonly environment: ApplicationEnvironment
  readonly logger: Logger
  /** Empty until the context is loaded. */
  properties: BoundProperties
}

/**
 * Result of a graceful stop.
 */
export type StopResult = {
  /** True if every stop hook finished before the deadline. */
  ok: boolean

  /** Hooks that threw while stopping. */
  failures: HookFailure[]

  /** True if the shutdown deadline was reached and remaining hooks were skipped. */
  timedOut: boolean
}

export interface ApplicationHandle {
  readonly context: ApplicationContext
  /** Idempotent; later calls return the first call's result. */
  stop(): Promise<StopResult>
}
