import type { Milliseconds, TimeSource } from "../../ports/time-source"

export class SystemTime implements TimeSource {
  nowMs(): Milliseconds {
    return Date.now()
  }
}

export const systemTime: TimeSource = new SystemTime()
