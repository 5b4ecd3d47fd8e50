import { mergePartials } from "../../core/merge"
import {
  FIELD_PATHS,
  type FieldPath,
  type FieldValues,
  flattenPartial,
  toPartial,
} from "../../core/model/field-paths"
import type { PartialConfig } from "../../core/model/types"
import type { SmartDefaultProvider } from "../../ports/defaults-provider"
import type { ProjectContext } from "../../ports/detector"
import type { LoadResult, SourceLoader } from "../../ports/loader"

export type SmartDefaultsInput = Readonly<{
  project: ProjectContext
  /** Configuration gathered upstream; only fields it leaves unset are filled. */
  current: PartialConfig
}>

const NEVER_DEFAULTED: ReadonlySet<FieldPath> = new Set<FieldPath>([
  "credentials.username",
  "credentials.password",
  "signing.keyId",
  "signing.password",
])

/**
 * Asks each applicable provider for fallbacks, lowest priority first, and
 * keeps only fields `current` leaves unset. Credentials and signing secrets
 * are dropped from provider output.
 */
export class SmartDefaultsLoader implements SourceLoader<SmartDefaultsInput> {
  readonly source = "SMART_DEFAULTS"
  private readonly providers: readonly SmartDefaultProvider[]

  constructor(providers: readonly SmartDefaultProvider[]) {
    this.providers = [...providers].sort((a, b) => a.priority - b.priority)
  }

  async load({ project, current }: SmartDefaultsInput): Promise<LoadResult> {
    let defaults: PartialConfig = {}

    for (const provider of this.providers) {
      if (!provider.canProvideDefaults(project)) continue

      defaults = mergePartials(defaults, provider.provideDefaults(project, current))
    }

    const upstream = flattenPartial(current)
    const offered = flattenPartial(defaults)
    const kept: FieldValues = {}

    for (const path of FIELD_PATHS) {
      if (NEVER_DEFAULTED.has(path) || upstream[path] !== undefined) continue
      keep(kept, offered, path)
    }

    return { source: this.source, partial: toPartial(kept), warnings: [] }
  }
}

function keep<P extends FieldPath>(into: FieldValues, from: FieldValues, path: P): void {
  const value = from[path]

  if (value !== undefined) {
    into[path] = value
  }
}
