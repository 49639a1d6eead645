import type { PhaseHandler, RunObserver } from "../ports/observer"

/**
 * Adapts one handler over tagged phase events into a `RunObserver`.
 *
 * @example
 * ```ts
 * notifier.addObserver(
 *   phaseObserver((event) => {
 *     if (event.phase === "failed") report(event.error)
 *   }),
 * )
 * ```
 */
export function phaseObserver<E = unknown, C = unknown>(handler: PhaseHandler<E, C>): RunObserver<E, C> {
  return {
    starting: () => handler({ phase: "starting" }),
    environmentPrepared: (environment) => handler({ phase: "environmentPrepared", environment }),
    contextPrepared: (context) => handler({ phase: "contextPrepared", context }),
    contextLoaded: (context) => handler({ phase: "contextLoaded", context }),
    started: (context) => handler({ phase: "started", context }),
    running: (context) => handler({ phase: "running", context }),
    failed: (context, error) => handler({ phase: "failed", context, error }),
  }
}
