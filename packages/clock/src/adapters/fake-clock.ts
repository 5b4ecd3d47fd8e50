import type { Clock } from "../ports/clock"
import { type Instant, type Milliseconds, toMilliseconds } from "../ports/time"

/**
 * Clock that only moves when told to. Starts at the Unix epoch unless pinned.
 *
 * @example
 * const clock = new FakeClock("2026-10-19T08:00:00.000Z")
 * clock.advance(1_500)
 * clock.timestamp() // "2026-10-19T08:00:01.500Z"
 */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Instant = 0) {
    this.time = toMilliseconds(start)
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  timestamp(): string {
    return this.now().toISOString()
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(instant: Instant): void {
    this.time = toMilliseconds(instant)
  }
}
