export type Milliseconds = number

export interface TimeSource {
  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}
