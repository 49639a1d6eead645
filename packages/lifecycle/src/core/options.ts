import type { BindingSpec, PropertySource } from "@bootkit/config"
import type { Logger } from "@bootkit/logger"
import type { ApplicationContext, ApplicationEnvironment } from "../ports/application"
import type { ApplicationRunner, LifecycleHook } from "../ports/lifecycle-hook"
import type { RunObserver } from "../ports/observer"
import type { Milliseconds, TimeSource } from "../ports/time-source"

export interface ApplicationDependencies {
  logger: Logger
  /** @default systemTime */
  time?: TimeSource
}

export type ApplicationObserver = RunObserver<ApplicationEnvironment, ApplicationContext>

export interface ApplicationOptions {
  /** Shown in logs and failure reports. */
  name: string

  /**
   * Property sources, later overriding earlier.
   * @default [new EnvSource()]
   */
  sources?: PropertySource[]

  /** Bindings to bind while the context loads, in order. */
  properties?: BindingSpec[]

  observers?: ApplicationObserver[]

  /** Run fail-fast after the context is loaded. */
  startHooks?: LifecycleHook[]

  /** Run in order once started. */
  runners?: ApplicationRunner[]

  /** Run on `stop()`, continuing past failures. */
  stopHooks?: LifecycleHook[]

  /**
   * Timeout for the start hooks in milliseconds.
   * @default 2_147_483_647 (max timer value, effectively no timeout)
   */
  startupTimeoutMs?: Milliseconds

  /**
   * Timeout for graceful stop in milliseconds.
   * @default 10_000
   */
  shutdownTimeoutMs?: Milliseconds
}

export type ResolvedApplicationOptions = Required<Omit<ApplicationOptions, "sources">> & {
  sources: PropertySource[] | undefined
}

const MAX_TIMER_MS: Milliseconds = 2_147_483_647

interface ApplicationDefaults {
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
}

export const DEFAULTS: ApplicationDefaults = {
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
}

export function resolveOptions(options: ApplicationOptions): ResolvedApplicationOptions {
  return {
    name: options.name,
    // left undefined so the loader applies its own default
    sources: options.sources,
    properties: options.properties ?? [],
    observers: options.observers ?? [],
    startHooks: options.startHooks ?? [],
    runners: options.runners ?? [],
    stopHooks: options.stopHooks ?? [],
    startupTimeoutMs: clampTimeout(options.startupTimeoutMs, DEFAULTS.startupTimeoutMs),
    shutdownTimeoutMs: clampTimeout(options.shutdownTimeoutMs, DEFAULTS.shutdownTimeoutMs),
  }
}

function clampTimeout(value: Milliseconds | undefined, fallback: Milliseconds): Milliseconds {
  if (value === undefined || !Number.isFinite(value)) return fallback

  return Math.min(Math.max(0, Math.floor(value)), MAX_TIMER_MS)
}
