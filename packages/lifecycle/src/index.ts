export { FakeTime } from "./adapters/time/fake-time"
export { SystemTime, systemTime } from "./adapters/time/system-time"
export {
  Application,
  type ApplicationCollaborators,
  createApplication,
  defaultCollaborators,
} from "./core/application"
export { type CreateStopperFn, createStopper, type StopperContext } from "./core/create-stopper"
export {
  type HookPhase,
  HookFailedError,
  HookTimeoutError,
  LifecycleStateError,
} from "./core/errors"
export { analyzeFailure, type FailureAnalysis } from "./core/failure-analysis"
export {
  type RunHooksContext,
  type RunHooksPolicy,
  type RunHooksResult,
  runHooks,
} from "./core/hooks/run-hooks"
export { type ShutdownContext, type ShutdownFn, shutdown } from "./core/hooks/shutdown"
export { type StartResult, type StartupContext, type StartupFn, startup } from "./core/hooks/startup"
export { loggingObserver } from "./core/logging-observer"
export {
  type ApplicationDependencies,
  type ApplicationObserver,
  type ApplicationOptions,
  DEFAULTS,
  type ResolvedApplicationOptions,
  resolveOptions,
} from "./core/options"
export { phaseObserver } from "./core/phase-observer"
export { RunNotifier } from "./core/run-notifier"
export {
  type SetupProcessHandlersFn,
  type SignalHandler,
  type SignalHandlerContext,
  setupProcessHandlers,
} from "./core/signals"
export type {
  ApplicationContext,
  ApplicationEnvironment,
  ApplicationHandle,
  StopResult,
} from "./ports/application"
export type {
  ApplicationRunner,
  HookFailure,
  LifecycleHook,
  LifecycleHookContext,
} from "./ports/lifecycle-hook"
export type { PhaseEvent, PhaseHandler, RunObserver } from "./ports/observer"
export { isLifecyclePhase, type LifecyclePhase, lifecyclePhases, type RunState } from "./ports/phase"
export type { Milliseconds, TimeSource } from "./ports/time-source"
