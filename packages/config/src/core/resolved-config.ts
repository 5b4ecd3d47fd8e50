import type { IResolvedConfig } from "../ports/config"
import type { ConfigurationSource } from "../ports/source"
import type { Diagnostics } from "./diagnostics"
import { type FieldPath, type FieldTypes, getField } from "./model/field-paths"
import type { PublisherConfig } from "./model/types"

export class ResolvedConfig implements IResolvedConfig {
  constructor(
    private readonly config: PublisherConfig,
    private readonly diagnostics: Diagnostics,
  ) {}

  get value(): PublisherConfig {
    return this.config
  }

  get<P extends FieldPath>(path: P): FieldTypes[P] {
    return getField(this.config, path)
  }

  explain(path: FieldPath): ConfigurationSource {
    return this.diagnostics.explain(path)
  }

  sourcesUsed(): ConfigurationSource[] {
    return [...this.config.metadata.sources]
  }
}
