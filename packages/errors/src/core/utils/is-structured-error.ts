import type { StructuredError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural check for errors shaped like {@link StructuredError}, including ones
 * created by another copy of this package.
 */
export function isStructuredError(e: unknown): e is StructuredError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    e.timestamp instanceof Date
  )
}
