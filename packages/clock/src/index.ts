export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Clock } from "./ports/clock"
export { type Instant, type Milliseconds, toMilliseconds } from "./ports/time"
