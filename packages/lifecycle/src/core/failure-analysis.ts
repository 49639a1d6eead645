import {
  InvalidFieldError,
  InvalidPrefixError,
  InvalidShapeError,
  UnknownFieldError,
} from "@bootkit/config"
import { findCause } from "@bootkit/errors"
import { HookFailedError, HookTimeoutError } from "./errors"

export type FailureAnalysis = Readonly<{
  description: string
  action: string
  /** The error in the cause chain the analysis is about. */
  cause: unknown
}>

type Analyzer = (error: unknown) => FailureAnalysis | undefined

function describeOrigin(origin: unknown): string {
  return typeof origin === "string" ? ` (from ${origin})` : ""
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function matching<T>(guard: (value: unknown) => value is T, analyze: (error: T) => FailureAnalysis): Analyzer {
  return (error) => {
    const cause = findCause(error, guard)

    return cause === undefined ? undefined : analyze(cause)
  }
}

// Configuration problems first: a hook failing on a bad property reports the property.
const analyzers: Analyzer[] = [
  matching(
    (e): e is UnknownFieldError => e instanceof UnknownFieldError,
    (e) => ({
      description: `The configuration key "${e.key}"${describeOrigin(e.context.origin)} does not match any field under prefix "${e.prefix}".`,
      action: `Remove "${e.key}" or correct its spelling, or allow unknown fields for this binding.`,
      cause: e,
    }),
  ),
  matching(
    (e): e is InvalidFieldError => e instanceof InvalidFieldError,
    (e) => ({
      description:
        `Failed to bind "${e.key}"${describeOrigin(e.context.origin)} to field "${e.field}": ` +
        `"${e.value}" is not a valid ${e.targetType} (${String(e.context.reason)}).`,
      action: `Update "${e.key}" to a valid ${e.targetType}.`,
      cause: e,
    }),
  ),
  matching(
    (e): e is InvalidPrefixError => e instanceof InvalidPrefixError,
    (e) => ({
      description: `The binding prefix "${e.prefix}" is not valid.`,
      action: `Use dot-separated lower-case kebab elements, such as "app.datasource".`,
      cause: e,
    }),
  ),
  matching(
    (e): e is InvalidShapeError => e instanceof InvalidShapeError,
    (e) => ({
      description: e.message,
      action: `Rename "${e.field}" so every field of its shape binds distinct keys.`,
      cause: e,
    }),
  ),
  matching(
    (e): e is HookTimeoutError => e instanceof HookTimeoutError,
    (e) => ({
      description: `The ${e.phase} hooks did not finish within ${e.timeoutMs} ms.`,
      action: `Increase ${e.phase}TimeoutMs or make the ${e.phase} hooks finish sooner.`,
      cause: e,
    }),
  ),
  matching(
    (e): e is HookFailedError => e instanceof HookFailedError,
    (e) => ({
      description: `The ${e.phase} hook "${e.hook}" failed: ${messageOf(e.cause)}.`,
      action: `Fix the error raised by "${e.hook}".`,
      cause: e,
    }),
  ),
]

/**
 * Explains why a run failed and what to do about it.
 *
 * Walks the cause chain for known bootstrap errors; anything else is
 * described by its message.
 */
export function analyzeFailure(error: unknown): FailureAnalysis {
  for (const analyze of analyzers) {
    const analysis = analyze(error)
    if (analysis) return analysis
  }

  return {
    description: messageOf(error),
    action: "Check the error and its cause for details.",
    cause: error,
  }
}
