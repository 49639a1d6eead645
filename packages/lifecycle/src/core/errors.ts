import { BootError } from "@bootkit/errors"
import type { LifecyclePhase, RunState } from "../ports/phase"
import type { Milliseconds } from "../ports/time-source"

export type HookPhase = "startup" | "shutdown"

export class LifecycleStateError extends BootError<"invalid_transition"> {
  constructor(
    readonly from: RunState,
    readonly to: LifecyclePhase,
  ) {
    super(`Cannot move the run from "${from}" to "${to}"`, {
      code: "invalid_transition",
      context: { from, to },
      isOperational: false,
    })
  }
}

export class HookFailedError extends BootError<"hook_failed"> {
  constructor(
    readonly hook: string,
    readonly phase: HookPhase,
    cause: unknown,
  ) {
    super(`The ${phase} hook "${hook}" failed`, {
      code: "hook_failed",
      context: { hook, phase },
      cause,
    })
  }
}

export class HookTimeoutError extends BootError<"hook_timeout"> {
  constructor(
    readonly phase: HookPhase,
    readonly timeoutMs: Milliseconds,
    cause?: unknown,
  ) {
    super(`The ${phase} hooks did not finish within ${timeoutMs} ms`, {
      code: "hook_timeout",
      context: { phase, timeoutMs },
      cause,
    })
  }
}
