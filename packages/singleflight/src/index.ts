export { MemorySingleflight } from "./adapters/memory/memory-single-flight"
export type { FlightResult, FlightSource, InFlightKey, Singleflight } from "./ports/single-flight"
