/** Milliseconds since the Unix epoch, or a duration in milliseconds. */
export type Milliseconds = number

/** Anything a clock can be pinned to. */
export type Instant = Date | string | Milliseconds

export function toMilliseconds(instant: Instant): Milliseconds {
  if (typeof instant === "number") return instant

  const ms = typeof instant === "string" ? Date.parse(instant) : instant.getTime()

  if (Number.isNaN(ms)) {
    throw new RangeError(`Not a valid instant: ${String(instant)}`)
  }

  return ms
}
