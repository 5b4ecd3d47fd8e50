import type { FieldPath } from "../core/model/field-paths"
import type { AutoDetectionSettings, PartialConfig } from "../core/model/types"

/**
 * The project being configured, as seen by detectors and default providers.
 */
export type ProjectContext = Readonly<{
  /** Project name as the build declares it. May be blank. */
  name: string

  /** Absolute project directory. */
  directory: string

  /** Name of the root project when this is a sub-project. */
  rootName?: string
}>

/**
 * - "high": read from an authoritative file (build script, `.git/config`)
 * - "medium": inferred, likely right (directory name)
 * - "low": a guess the user should confirm
 */
export type Confidence = "high" | "medium" | "low"

/** Lowest to highest. */
export const CONFIDENCE_LEVELS = ["low", "medium", "high"] as const satisfies readonly Confidence[]

export function compareConfidence(a: Confidence, b: Confidence): number {
  return CONFIDENCE_LEVELS.indexOf(a) - CONFIDENCE_LEVELS.indexOf(b)
}

/** Where a detected value came from and how far to trust it. */
export type DetectedValue = Readonly<{
  path: FieldPath
  /** Display form of the value. */
  value: string
  /** File or mechanism it was read from, e.g. `.git/config`. */
  origin: string
  confidence: Confidence
}>

export type DetectedValues = Readonly<{ [P in FieldPath]?: DetectedValue }>

export type DetectionResult = Readonly<{
  config: PartialConfig
  /** Provenance for fields of `config`, one entry per path. */
  detectedValues?: readonly DetectedValue[]
  warnings?: readonly string[]
}>

export type DetectorCategory = keyof AutoDetectionSettings

/**
 * Derives configuration from the project itself (git remotes, build files, ...).
 *
 * Returning nothing means the detector found nothing to contribute.
 */
export interface AutoDetector {
  readonly name: string

  /** Toggle in `autoDetection` that switches this detector off. */
  readonly category?: DetectorCategory

  detect(
    project: ProjectContext,
  ): DetectionResult | undefined | Promise<DetectionResult | undefined>
}
