import type { PartialConfig } from "../../core/model/types"
import type { LoadResult, SourceLoader } from "../../ports/loader"

/**
 * Passes explicit configuration through unchanged.
 */
export class DslLoader implements SourceLoader<PartialConfig> {
  readonly source = "DSL"

  async load(explicit: PartialConfig): Promise<LoadResult> {
    return { source: this.source, partial: explicit, warnings: [] }
  }
}
