import type { Milliseconds, TimeSource } from "../../ports/time-source"

/** Manually driven time for tests. */
export class FakeTime implements TimeSource {
  private time: Milliseconds

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }
}
