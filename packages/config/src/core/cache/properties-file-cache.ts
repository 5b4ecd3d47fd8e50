import fs from "node:fs/promises"
import path from "node:path"
import { MemorySingleflight, type Singleflight } from "@sigil/singleflight"
import { getProperties } from "properties-file"
import { ConfigurationError } from "../errors"

/** Parsed `key=value` entries of one file. Frozen. */
export type PropertiesEntries = Readonly<Record<string, string>>

export type PropertiesParser = (file: string) => Promise<Record<string, string>>

type CacheEntry = Readonly<{
  entries: PropertiesEntries
  mtimeMs: number
}>

export type PropertiesFlight = Readonly<{
  entries: PropertiesEntries
  loaded: boolean
}>

/**
 * Reads a `.properties` file. `#` and `!` start a comment only at the
 * beginning of a line; `=`, `:` or whitespace separate key and value;
 * backslash escapes and line continuations are decoded. A later duplicate
 * key wins.
 */
export async function readPropertiesFile(file: string): Promise<Record<string, string>> {
  const content = await fs.readFile(file, "utf-8")

  return getProperties(content)
}

/**
 * Parsed properties files keyed by absolute path and invalidated by
 * modification time.
 *
 * Concurrent callers for the same (path, mtime) share one parse. The cache
 * lives as long as its owner; {@link sharedFileCache} is the process-wide
 * instance.
 */
export class PropertiesFileCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly flights: Singleflight<PropertiesFlight>
  private hitCount = 0
  private missCount = 0

  constructor(deps: { singleflight?: Singleflight<PropertiesFlight> } = {}) {
    this.flights = deps.singleflight ?? new MemorySingleflight<PropertiesFlight>()
  }

  /**
   * Returns the parsed entries of `file`, parsing it only when there is no
   * entry at least as new as the file.
   *
   * @throws the `fs.stat` error when the file cannot be stat'ed (ENOENT for
   * a missing file)
   * @throws ConfigurationError `unreadable_source` for a non-regular file
   */
  async getOrLoad(
    file: string,
    parser: PropertiesParser = readPropertiesFile,
  ): Promise<PropertiesEntries> {
    const key = path.resolve(file)
    const stats = await fs.stat(key)

    if (!stats.isFile()) {
      throw new ConfigurationError(`Not a regular file: ${key}`, {
        code: "unreadable_source",
        context: { file: key },
      })
    }

    const mtimeMs = stats.mtimeMs
    const cached = this.fresh(key, mtimeMs)

    if (cached) {
      this.hitCount++
      return cached.entries
    }

    const flight = await this.flights.run(`${key}@${mtimeMs}`, async () => {
      const again = this.fresh(key, mtimeMs)
      if (again) return { entries: again.entries, loaded: false }

      this.missCount++
      const entries = Object.freeze({ ...(await parser(key)) })
      const current = this.entries.get(key)

      if (!current || current.mtimeMs <= mtimeMs) {
        this.entries.set(key, { entries, mtimeMs })
      }

      return { entries, loaded: true }
    })

    if (!flight.isLeader || !flight.value.loaded) {
      this.hitCount++
    }

    return flight.value.entries
  }

  private fresh(key: string, mtimeMs: number): CacheEntry | undefined {
    const entry = this.entries.get(key)

    return entry && entry.mtimeMs >= mtimeMs ? entry : undefined
  }

  get hits(): number {
    return this.hitCount
  }

  get misses(): number {
    return this.missCount
  }

  get size(): number {
    return this.entries.size
  }

  clear(): void {
    this.entries.clear()
    this.hitCount = 0
    this.missCount = 0
  }
}

let shared: PropertiesFileCache | undefined

/**
 * Process-wide cache, created on first use. Entries are only ever
 * invalidated by mtime.
 */
export function sharedFileCache(): PropertiesFileCache {
  shared ??= new PropertiesFileCache()
  return shared
}
