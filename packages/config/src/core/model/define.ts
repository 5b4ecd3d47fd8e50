import { buildConfig, flattenPartial, toPartial } from "./field-paths"
import type { DeveloperInfo, PartialConfig, PublisherConfig } from "./types"
import { developer } from "./values"

type ProjectInfoInput = Omit<NonNullable<PartialConfig["projectInfo"]>, "developers"> & {
  developers?: readonly Partial<DeveloperInfo>[]
}

/**
 * Explicit configuration as written by the user. Developers may omit fields.
 */
export type ConfigInput = Omit<PartialConfig, "projectInfo"> & {
  projectInfo?: ProjectInfoInput
}

/**
 * Normalizes explicit configuration into a frozen partial.
 *
 * Blank strings are dropped, developer entries get every field, and the
 * publication sets are sorted and de-duplicated.
 *
 * @example
 * ```typescript
 * const explicit = defineConfig({
 *   projectInfo: {
 *     name: "widgets",
 *     developers: [{ id: "jdoe", email: "jdoe@example.com" }],
 *   },
 *   publishing: { autoPublish: true },
 * })
 * ```
 */
export function defineConfig(input: ConfigInput): PartialConfig {
  const { projectInfo, ...rest } = input
  let info: PartialConfig["projectInfo"]

  if (projectInfo) {
    const { developers, ...fields } = projectInfo
    info = {
      ...fields,
      ...(developers && { developers: developers.map((dev) => developer(dev)) }),
    }
  }

  const partial: PartialConfig = { ...rest, ...(info && { projectInfo: info }) }

  return toPartial(flattenPartial(partial))
}

/** The configuration every field takes when no source sets it. */
export function emptyConfig(): PublisherConfig {
  return buildConfig({})
}
