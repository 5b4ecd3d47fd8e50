import type { Milliseconds } from "./time"

/** Source of the current time, injected wherever a timestamp is stamped. */
export interface Clock {
  now(): Date

  /** Milliseconds since the Unix epoch; use for durations. */
  nowMs(): Milliseconds

  /** Current time as an ISO-8601 UTC string, e.g. `2026-10-19T08:00:00.000Z`. */
  timestamp(): string
}
