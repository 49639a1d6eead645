import type { RunObserver } from "../ports/observer"
import type { LifecyclePhase, RunState } from "../ports/phase"
import { LifecycleStateError } from "./errors"

const NEXT: Record<RunState, LifecyclePhase | undefined> = {
  notStarted: "starting",
  starting: "environmentPrepared",
  environmentPrepared: "contextPrepared",
  contextPrepared: "contextLoaded",
  contextLoaded: "started",
  started: "running",
  running: undefined,
  done: undefined,
  failed: undefined,
}

/**
 * Walks a run through its bootstrap phases and notifies observers.
 *
 * Phases fire once each, in order: `starting`, `environmentPrepared`,
 * `contextPrepared`, `contextLoaded`, `started`, `running`. `failed` may
 * replace any of them once and ends the run. Any other call throws
 * `LifecycleStateError` without notifying anyone.
 *
 * The state moves before observers are called, so a throwing observer leaves
 * the run in the phase it was notified of; the caller then reports `failed`.
 */
export class RunNotifier<E = unknown, C = unknown> {
  private current: RunState = "notStarted"
  private readonly fired: LifecyclePhase[] = []
  private readonly observers: RunObserver<E, C>[]

  constructor(observers: Iterable<RunObserver<E, C>> = []) {
    this.observers = [...observers]
  }

  get state(): RunState {
    return this.current
  }

  /** Phases fired so far, in order. */
  history(): LifecyclePhase[] {
    return [...this.fired]
  }

  /** Observers added late only hear about phases still to come. */
  addObserver(observer: RunObserver<E, C>): void {
    this.observers.push(observer)
  }

  starting(): void {
    this.advance("starting", (observer) => observer.starting?.())
  }

  environmentPrepared(environment: E): void {
    this.advance("environmentPrepared", (observer) => observer.environmentPrepared?.(environment))
  }

  contextPrepared(context: C): void {
    this.advance("contextPrepared", (observer) => observer.contextPrepared?.(context))
  }

  contextLoaded(context: C): void {
    this.advance("contextLoaded", (observer) => observer.contextLoaded?.(context))
  }

  started(context: C): void {
    this.advance("started", (observer) => observer.started?.(context))
  }

  running(context: C): void {
    this.advance("running", (observer) => observer.running?.(context))
    this.current = "done"
  }

  failed(context: C | undefined, error: unknown): void {
    if (this.current === "failed" || this.current === "done") {
      throw new LifecycleStateError(this.current, "failed")
    }

    this.enter("failed")
    this.notify((observer) => observer.failed?.(context, error))
  }

  private advance(phase: LifecyclePhase, call: (observer: RunObserver<E, C>) => void): void {
    if (NEXT[this.current] !== phase) {
      throw new LifecycleStateError(this.current, phase)
    }

    this.enter(phase)
    this.notify(call)
  }

  private enter(phase: LifecyclePhase): void {
    this.current = phase
    this.fired.push(phase)
  }

  private notify(call: (observer: RunObserver<E, C>) => void): void {
    for (const observer of [...this.observers]) {
      call(observer)
    }
  }
}
