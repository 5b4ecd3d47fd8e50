import { toAppError } from "@sigil/errors"
import { mergePartials } from "../../core/merge"
import type { AutoDetectionSettings, PartialConfig } from "../../core/model/types"
import type { FieldPath } from "../../core/model/field-paths"
import {
  type AutoDetector,
  compareConfidence,
  type DetectedValue,
  type DetectedValues,
  type ProjectContext,
} from "../../ports/detector"
import type { LoadResult, LoadWarning, SourceLoader } from "../../ports/loader"

export type AutoDetectionInput = Readonly<{
  project: ProjectContext
  /** Explicit toggles. A category set to `false` skips its detectors. */
  settings?: Partial<AutoDetectionSettings>
}>

export type AutoDetectionLoadResult = LoadResult &
  Readonly<{
    detectedValues: DetectedValues
    /** Detectors that ran, skipped categories excluded. */
    detectorsRun: readonly string[]
  }>

/**
 * Runs detectors in declaration order and merges their output; a later
 * detector overrides an earlier one field by field.
 *
 * Detected values are merged separately: per path the highest confidence
 * wins, and on a tie the first detector to report it.
 *
 * A detector that throws becomes a `detector_failed` warning and the
 * remaining detectors still run.
 */
export class AutoDetectionLoader implements SourceLoader<AutoDetectionInput> {
  readonly source = "AUTO_DETECTED"

  constructor(private readonly detectors: readonly AutoDetector[]) {}

  async load({ project, settings }: AutoDetectionInput): Promise<AutoDetectionLoadResult> {
    let partial: PartialConfig = {}
    const warnings: LoadWarning[] = []
    const detected: { [P in FieldPath]?: DetectedValue } = {}
    const detectorsRun: string[] = []

    for (const detector of this.detectors) {
      if (detector.category && settings?.[detector.category] === false) continue

      detectorsRun.push(detector.name)

      try {
        const result = await detector.detect(project)
        if (!result) continue

        partial = mergePartials(partial, result.config)

        for (const value of result.detectedValues ?? []) {
          const existing = detected[value.path]

          if (!existing || compareConfidence(value.confidence, existing.confidence) > 0) {
            detected[value.path] = value
          }
        }

        for (const message of result.warnings ?? []) {
          warnings.push({
            source: this.source,
            code: "detector_warning",
            key: detector.name,
            message,
          })
        }
      } catch (err) {
        const error = toAppError(err, "detector_failed")

        warnings.push({
          source: this.source,
          code: "detector_failed",
          key: detector.name,
          message: `Detector ${detector.name} failed: ${error.message}`,
        })
      }
    }

    return {
      source: this.source,
      partial,
      warnings,
      detectedValues: Object.freeze(detected),
      detectorsRun,
    }
  }
}
