import {
  BoundProperties,
  type ConfigSource,
  type LoadConfigSourceOptions,
  loadConfigSource,
  PropertiesRegistry,
} from "@bootkit/config"
import type { Logger } from "@bootkit/logger"
import { systemTime } from "../adapters/time/system-time"
import type {
  ApplicationContext,
  ApplicationEnvironment,
  ApplicationHandle,
  StopResult,
} from "../ports/application"
import type { LifecyclePhase, RunState } from "../ports/phase"
import type { TimeSource } from "../ports/time-source"
import { type CreateStopperFn, createStopper } from "./create-stopper"
import { HookFailedError, HookTimeoutError, LifecycleStateError } from "./errors"
import { analyzeFailure } from "./failure-analysis"
import { type ShutdownFn, shutdown } from "./hooks/shutdown"
import { type StartupFn, startup } from "./hooks/startup"
import { loggingObserver } from "./logging-observer"
import {
  type ApplicationDependencies,
  type ApplicationOptions,
  type ResolvedApplicationOptions,
  resolveOptions,
} from "./options"
import { RunNotifier } from "./run-notifier"
import { type SetupProcessHandlersFn, type SignalHandler, setupProcessHandlers } from "./signals"

export interface ApplicationCollaborators {
  loadConfigSource: (options: LoadConfigSourceOptions) => Promise<ConfigSource>
  onStartup: StartupFn
  onShutdown: ShutdownFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
}

export const defaultCollaborators: ApplicationCollaborators = {
  loadConfigSource,
  onStartup: startup,
  onShutdown: shutdown,
  createStopper,
  setupProcessHandlers,
}

/**
 * Bootstraps an application through the lifecycle phases.
 *
 * `run()` loads configuration, prepares and loads the context (binding every
 * registered properties spec), runs the start hooks and runners, and returns
 * a handle to stop it. A failure at any step reports `failed` to the
 * observers, logs a failure analysis and rethrows the original error.
 */
export class Application {
  private readonly logger: Logger
  private readonly time: TimeSource
  private readonly notifier: RunNotifier<ApplicationEnvironment, ApplicationContext>
  private readonly registry = new PropertiesRegistry()

  private handle?: ApplicationHandle
  private signalHandler?: SignalHandler

  constructor(
    deps: ApplicationDependencies,
    private readonly options: ResolvedApplicationOptions,
    private readonly collabs: ApplicationCollaborators = defaultCollaborators,
  ) {
    this.logger = deps.logger.child({ app: options.name })
    this.time = deps.time ?? systemTime
    this.notifier = new RunNotifier<ApplicationEnvironment, ApplicationContext>([
      loggingObserver(this.logger),
      ...options.observers,
    ])

    for (const spec of options.properties) {
      this.registry.register(spec)
    }
  }

  get state(): RunState {
    return this.notifier.state
  }

  /** Phases fired so far. */
  history(): LifecyclePhase[] {
    return this.notifier.history()
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.logger,
      stop: () => this.handle?.stop() ?? this.noopStop(),
    })

    return this
  }

  /** May be called once; later calls throw `LifecycleStateError`. */
  async run(): Promise<ApplicationHandle> {
    if (this.notifier.state !== "notStarted") {
      throw new LifecycleStateError(this.notifier.state, "starting")
    }

    const startedAt = this.time.nowMs()
    let context: ApplicationContext | undefined

    try {
      this.notifier.starting()

      const source = await this.collabs.loadConfigSource({ sources: this.options.sources })
      const environment: ApplicationEnvironment = { source }
      this.notifier.environmentPrepared(environment)

      context = {
        name: this.options.name,
        environment,
        logger: this.logger,
        properties: BoundProperties.empty(source),
      }
      this.notifier.contextPrepared(context)

      context.properties = this.registry.bindAll(source)
      this.notifier.contextLoaded(context)

      await this.runStartHooks(context)
      this.notifier.started(context)

      const durationMs = this.time.nowMs() - startedAt
      this.logger.info(`Started ${this.options.name} in ${durationMs} ms`, { durationMs })

      for (const runner of this.options.runners) {
        this.logger.debug(`Calling runner: ${runner.name}`)
        await runner.run(context)
      }
      this.notifier.running(context)

      this.handle = this.collabs.createStopper({
        context,
        time: this.time,
        logger: this.logger,
        shutdownTimeoutMs: this.options.shutdownTimeoutMs,
        stopHooks: this.options.stopHooks,
        shutdown: this.collabs.onShutdown,
        onStop: () => this.signalHandler?.unregister(),
      })

      return this.handle
    } catch (err) {
      this.reportFailure(context, err)
      throw err
    }
  }

  private async runStartHooks(context: ApplicationContext): Promise<void> {
    const result = await this.collabs.onStartup({
      time: this.time,
      logger: this.logger,
      deadlineMs: this.time.nowMs() + this.options.startupTimeoutMs,
      startHooks: this.options.startHooks,
      context,
    })

    if (result.ok) return

    const [failure] = result.failures

    if (result.timedOut) {
      throw new HookTimeoutError("startup", this.options.startupTimeoutMs, failure?.error)
    }
    if (failure) {
      throw new HookFailedError(failure.hook, "startup", failure.error)
    }
  }

  private reportFailure(context: ApplicationContext | undefined, err: unknown): void {
    // An observer may have thrown from `running`, after the run completed its phases.
    if (this.notifier.state !== "failed" && this.notifier.state !== "done") {
      try {
        this.notifier.failed(context, err)
      } catch (observerErr) {
        this.logger.warn("A lifecycle observer threw while handling a failed run", {
          err: observerErr,
        })
      }
    }

    const analysis = analyzeFailure(err)

    this.logger.error(`Application run failed: ${analysis.description}`, {
      err,
      action: analysis.action,
    })
  }

  private noopStop(): Promise<StopResult> {
    this.logger.warn("Stop called but application not running")

    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createApplication(deps: ApplicationDependencies, options: ApplicationOptions): Application {
  return new Application(deps, resolveOptions(options))
}
