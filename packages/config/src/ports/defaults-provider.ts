import type { PartialConfig } from "../core/model/types"
import type { ProjectContext } from "./detector"

/**
 * Supplies context-aware fallbacks for fields nothing else has set.
 *
 * Providers are consulted lowest priority first, so a higher priority
 * provider overrides a lower one. Common priorities: 100 for framework
 * specific defaults, 50 for language specific ones, 10 for generic ones.
 */
export interface SmartDefaultProvider {
  readonly name: string
  readonly priority: number

  canProvideDefaults(project: ProjectContext): boolean

  /**
   * @param existing - configuration gathered so far; providers should only
   * fill what it leaves unset.
   */
  provideDefaults(project: ProjectContext, existing: PartialConfig): PartialConfig
}
