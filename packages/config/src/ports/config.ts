import type { FieldPath, FieldTypes } from "../core/model/field-paths"
import type { PublisherConfig } from "../core/model/types"
import type { ConfigurationSource } from "./source"

/**
 * A resolved publishing configuration with per-field provenance.
 *
 * @example
 * ```typescript
 * const { config } = await resolveConfiguration({
 *   explicit: defineConfig({ credentials: { username: "dsl-user" } }),
 *   propertiesFile: "gradle.properties",
 * })
 *
 * config.get("credentials.username")     // "dsl-user"
 * config.explain("credentials.username") // "DSL"
 * config.explain("publishing.dryRun")    // "DEFAULTS"
 * ```
 */
export interface IResolvedConfig {
  /** Full resolved config object */
  readonly value: PublisherConfig

  get<P extends FieldPath>(path: P): FieldTypes[P]

  /**
   * Explains which source provided the final value for a field.
   *
   * @returns The winning source, or `"DEFAULTS"` when no source set it.
   */
  explain(path: FieldPath): ConfigurationSource

  /**
   * Sources that contributed at least one value, in precedence order.
   */
  sourcesUsed(): ConfigurationSource[]
}
