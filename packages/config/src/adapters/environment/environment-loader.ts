import { applyMappings, ENVIRONMENT_MAPPINGS, type PropertyMapping } from "../../core/mapping"
import type { LoadResult, SourceLoader } from "../../ports/loader"

export type EnvironmentLoaderOptions = {
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
  /** @default ENVIRONMENT_MAPPINGS */
  mappings?: readonly PropertyMapping[]
}

export class EnvironmentLoader implements SourceLoader<void> {
  readonly source = "ENVIRONMENT"
  private readonly env: Readonly<Record<string, string | undefined>>
  private readonly mappings: readonly PropertyMapping[]

  constructor(options: EnvironmentLoaderOptions = {}) {
    this.env = options.env ?? process.env
    this.mappings = options.mappings ?? ENVIRONMENT_MAPPINGS
  }

  async load(): Promise<LoadResult> {
    const { partial, warnings } = applyMappings(this.env, this.mappings, this.source)

    return { source: this.source, partial, warnings }
  }
}
