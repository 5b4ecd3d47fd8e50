import { toAppError } from "@sigil/errors"
import {
  type PropertiesFileCache,
  type PropertiesParser,
  readPropertiesFile,
} from "../../core/cache/properties-file-cache"
import {
  applyMappings,
  DEFAULT_PROPERTY_MAPPINGS,
  type PropertyMapping,
} from "../../core/mapping"
import { buildConfig } from "../../core/model/field-paths"
import { validateConfig } from "../../core/validate"
import type { LoadResult, LoadWarning, SourceLoader } from "../../ports/loader"

export type PropertiesLoaderOptions = {
  fileCache: PropertiesFileCache

  /** @default DEFAULT_PROPERTY_MAPPINGS */
  mappings?: readonly PropertyMapping[]

  /**
   * Validate the loaded values and report each violation as a
   * `validation_failed` warning.
   * @default false
   */
  validateOnLoad?: boolean

  /** @default readPropertiesFile */
  parser?: PropertiesParser
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")
}

/**
 * Loads a `key=value` properties file through the file cache.
 *
 * A missing file is routine and yields an empty partial. A file that exists
 * but cannot be read yields an empty partial and an `unreadable_source`
 * warning.
 */
export class PropertiesLoader implements SourceLoader<string> {
  readonly source = "PROPERTIES"
  private readonly fileCache: PropertiesFileCache
  private readonly mappings: readonly PropertyMapping[]
  private readonly validateOnLoad: boolean
  private readonly parser: PropertiesParser

  constructor(options: PropertiesLoaderOptions) {
    this.fileCache = options.fileCache
    this.mappings = options.mappings ?? DEFAULT_PROPERTY_MAPPINGS
    this.validateOnLoad = options.validateOnLoad ?? false
    this.parser = options.parser ?? readPropertiesFile
  }

  async load(file: string): Promise<LoadResult> {
    let entries: Readonly<Record<string, string>>

    try {
      entries = await this.fileCache.getOrLoad(file, this.parser)
    } catch (err) {
      if (isMissingFile(err)) {
        return { source: this.source, partial: {}, warnings: [] }
      }

      const error = toAppError(err, "unreadable_source")

      return {
        source: this.source,
        partial: {},
        warnings: [
          {
            source: this.source,
            code: "unreadable_source",
            path: file,
            message: `Could not read ${file}: ${error.message}`,
          },
        ],
      }
    }

    const { partial, warnings } = applyMappings(entries, this.mappings, this.source)

    if (!this.validateOnLoad) {
      return { source: this.source, partial, warnings }
    }

    const violations: LoadWarning[] = validateConfig(buildConfig(partial)).map((v) => ({
      source: this.source,
      code: "validation_failed",
      key: v.field,
      path: file,
      message: v.message,
    }))

    return { source: this.source, partial, warnings: [...warnings, ...violations] }
  }
}
