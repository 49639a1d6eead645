import type { Logger } from "@bootkit/logger"
import type { RunObserver } from "../ports/observer"
import { phaseObserver } from "./phase-observer"

/** Logs every phase at `debug`. */
export function loggingObserver<E = unknown, C = unknown>(logger: Logger): RunObserver<E, C> {
  return phaseObserver<E, C>((event) => {
    if (event.phase === "failed") {
      logger.debug("Lifecycle phase: failed", { phase: event.phase, err: event.error })
      return
    }

    logger.debug(`Lifecycle phase: ${event.phase}`, { phase: event.phase })
  })
}
