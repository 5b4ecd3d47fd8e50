import type { ConfigurationSource } from "../ports/source"
import { compareSources, precedenceOf } from "../ports/source"
import { formatFieldValue } from "./mask"
import {
  defaultValueOf,
  FIELD_PATHS,
  type FieldPath,
  type FieldTypes,
  type FieldValues,
  flattenPartial,
} from "./model/field-paths"
import type { PartialConfig } from "./model/types"

export type RecordedValue<V> = Readonly<{
  value: V
  source: ConfigurationSource
}>

export type DiagnosticsReportRow = Readonly<{
  path: FieldPath
  /** Display value, secrets masked. */
  value: string
  source: ConfigurationSource
  /** Lower-precedence sources that also set the field. */
  overridden: readonly ConfigurationSource[]
}>

type Records = { [P in FieldPath]?: RecordedValue<FieldTypes[P]>[] }

/**
 * Provenance of one resolution: every value every source supplied, in the
 * order the loaders ran, including values later overridden.
 *
 * Not shared between resolutions.
 */
export class Diagnostics {
  private readonly sources = new Set<ConfigurationSource>()
  private readonly records: Records = {}

  recordSource(source: ConfigurationSource): void {
    this.sources.add(source)
  }

  recordValue<P extends FieldPath>(path: P, value: FieldTypes[P], source: ConfigurationSource): void {
    const list: NonNullable<Records[P]> = this.records[path] ?? []

    list.push({ value, source })
    this.records[path] = list
  }

  /**
   * Records every set field of `partial`. The source counts as used only
   * when at least one field was recorded.
   *
   * @returns number of fields recorded
   */
  recordPartial(partial: PartialConfig, source: ConfigurationSource): number {
    const values = flattenPartial(partial)
    let count = 0

    for (const path of FIELD_PATHS) {
      if (this.recordFrom(values, path, source)) count++
    }

    if (count > 0) this.recordSource(source)

    return count
  }

  private recordFrom<P extends FieldPath>(
    values: FieldValues,
    path: P,
    source: ConfigurationSource,
  ): boolean {
    const value = values[path]
    if (value === undefined) return false

    this.recordValue(path, value, source)

    return true
  }

  /** Contributing sources in precedence order. */
  sourcesUsed(): ConfigurationSource[] {
    return [...this.sources].sort(compareSources)
  }

  /** Arrival order, not precedence order. */
  valuesFor<P extends FieldPath>(path: P): readonly RecordedValue<FieldTypes[P]>[] {
    return [...(this.records[path] ?? [])]
  }

  private winner<P extends FieldPath>(path: P): RecordedValue<FieldTypes[P]> | undefined {
    let best: RecordedValue<FieldTypes[P]> | undefined

    for (const entry of this.records[path] ?? []) {
      if (!best || precedenceOf(entry.source) >= precedenceOf(best.source)) {
        best = entry
      }
    }

    return best
  }

  /** Value from the highest-precedence source, else the type default. */
  finalValue<P extends FieldPath>(path: P): FieldTypes[P] {
    const best = this.winner(path)

    return best ? best.value : defaultValueOf(path)
  }

  explain(path: FieldPath): ConfigurationSource {
    return this.winner(path)?.source ?? "DEFAULTS"
  }

  /** Paths with at least one recorded value, in field order. */
  paths(): FieldPath[] {
    return FIELD_PATHS.filter((path) => (this.records[path]?.length ?? 0) > 0)
  }

  report(): DiagnosticsReportRow[] {
    return this.paths().map((path) => this.reportRow(path))
  }

  private reportRow<P extends FieldPath>(path: P): DiagnosticsReportRow {
    const source = this.explain(path)
    const overridden = this.valuesFor(path)
      .map((entry) => entry.source)
      .filter((s) => s !== source)
      .sort(compareSources)

    return {
      path,
      value: formatFieldValue(path, this.finalValue(path)),
      source,
      overridden,
    }
  }
}
