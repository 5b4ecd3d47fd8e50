import type { ConfigurationSource } from "../ports/source"
import { compareSources } from "../ports/source"
import { flattenPartial, toPartial } from "./model/field-paths"
import type { PartialConfig } from "./model/types"

export type Layer = Readonly<{
  source: ConfigurationSource
  partial: PartialConfig
}>

/**
 * Field-by-field merge: every field set in `override` replaces the one in
 * `base`, unset fields keep `base`. Lists are replaced whole, never joined.
 */
export function mergePartials(base: PartialConfig, override: PartialConfig): PartialConfig {
  return toPartial({ ...flattenPartial(base), ...flattenPartial(override) })
}

/**
 * Merges layers in ascending source precedence, whatever their input order.
 */
export function mergeLayers(layers: readonly Layer[]): PartialConfig {
  return [...layers]
    .sort((a, b) => compareSources(a.source, b.source))
    .reduce<PartialConfig>((merged, layer) => mergePartials(merged, layer.partial), {})
}
