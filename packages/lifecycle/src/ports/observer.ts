/**
 * Receives bootstrap phase notifications.
 *
 * Every callback is optional. Callbacks run synchronously, in registration
 * order; a thrown value propagates to whoever advanced the run.
 */
export interface RunObserver<E = unknown, C = unknown> {
  starting?(): void
  environmentPrepared?(environment: E): void
  contextPrepared?(context: C): void
  contextLoaded?(context: C): void
  started?(context: C): void
  running?(context: C): void
  /** `context` is `undefined` when the run failed before one was created. */
  failed?(context: C | undefined, error: unknown): void
}

export type PhaseEvent<E = unknown, C = unknown> =
  | { phase: "starting" }
  | { phase: "environmentPrepared"; environment: E }
  | { phase: "contextPrepared"; context: C }
  | { phase: "contextLoaded"; context: C }
  | { phase: "started"; context: C }
  | { phase: "running"; context: C }
  | { phase: "failed"; context: C | undefined; error: unknown }

export type PhaseHandler<E = unknown, C = unknown> = (event: PhaseEvent<E, C>) => void
