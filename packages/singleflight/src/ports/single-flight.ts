export type InFlightKey = string

/**
 * - "leader": this caller executed the function
 * - "inflight": this caller joined a call started by another
 */
export type FlightSource = "leader" | "inflight"

export interface FlightResult<T> {
  value: T

  isLeader: boolean

  /** Number of other callers that shared this result (excluding leader) */
  sharedWith: number

  source: FlightSource
}

/**
 * Deduplicates concurrent work per key.
 *
 * Calls to `run()` with a key that is already in flight share the leader's
 * promise and settle with the same value or the same error. Once a flight
 * settles the key is free again; the next call starts fresh.
 */
export interface Singleflight<T = unknown> {
  run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>>

  /**
   * Detach the current flight for `key`. Callers already waiting still get its
   * outcome; the next caller starts a new flight.
   */
  forget(key: InFlightKey): void

  readonly size: number
}
