export const lifecyclePhases = [
  "starting",
  "environmentPrepared",
  "contextPrepared",
  "contextLoaded",
  "started",
  "running",
  "failed",
] as const

export type LifecyclePhase = (typeof lifecyclePhases)[number]

/**
 * Where a run is: the last phase fired, `notStarted` before the first one,
 * `done` once every `running` observer returned.
 */
export type RunState = "notStarted" | LifecyclePhase | "done"

export function isLifecyclePhase(value: string): value is LifecyclePhase {
  return lifecyclePhases.some((phase) => phase === value)
}
