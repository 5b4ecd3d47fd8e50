import type { PartialConfig } from "../core/model/types"
import type { ConfigurationSource } from "./source"

export type LoadWarningCode =
  | "malformed_entry"
  | "unreadable_source"
  | "detector_failed"
  | "detector_warning"
  | "validation_failed"

/**
 * A non-fatal problem found while loading one source.
 *
 * `key` names the external key (property, variable, detector) and `path`
 * the file or field involved, where there is one.
 */
export type LoadWarning = Readonly<{
  source: ConfigurationSource
  code: LoadWarningCode
  message: string
  key?: string
  path?: string
}>

export type LoadResult = Readonly<{
  source: ConfigurationSource
  partial: PartialConfig
  warnings: readonly LoadWarning[]
}>

/**
 * Loads one source into a partial configuration.
 *
 * A loader never rejects for routine absence of input (missing file, unset
 * variables): it resolves to an empty partial with no warnings. Bad entries
 * and unreadable input become warnings.
 */
export interface SourceLoader<I> {
  readonly source: ConfigurationSource

  load(input: I): Promise<LoadResult>
}
