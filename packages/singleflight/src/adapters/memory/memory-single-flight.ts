import type { FlightResult, InFlightKey, Singleflight } from "../../ports/single-flight"

interface InFlight<T> {
  promise: Promise<T>
  followerCount: number
  forgotten: boolean
}

export class MemorySingleflight<T = unknown> implements Singleflight<T> {
  private readonly flights = new Map<InFlightKey, InFlight<T>>()

  async run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>> {
    const existing = this.flights.get(key)

    if (existing) {
      existing.followerCount++
      const value = await existing.promise

      return {
        value,
        isLeader: false,
        sharedWith: existing.followerCount,
        source: "inflight",
      }
    }

    const promise = fn()
    const flight: InFlight<T> = { promise, followerCount: 0, forgotten: false }

    this.flights.set(key, flight)

    try {
      const value = await promise

      return {
        value,
        isLeader: true,
        sharedWith: flight.followerCount,
        source: "leader",
      }
    } finally {
      if (!flight.forgotten) {
        this.flights.delete(key)
      }
    }
  }

  forget(key: InFlightKey): void {
    const flight = this.flights.get(key)

    if (flight) {
      flight.forgotten = true
      this.flights.delete(key)
    }
  }

  get size(): number {
    return this.flights.size
  }
}
