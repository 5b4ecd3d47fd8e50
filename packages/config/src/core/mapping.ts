import type { ConfigurationSource } from "../ports/source"
import type { LoadWarning } from "../ports/loader"
import type { BooleanFieldPath, FieldValues, StringFieldPath } from "./model/field-paths"
import { isBooleanField, toPartial } from "./model/field-paths"
import type { DeveloperInfo, PartialConfig } from "./model/types"
import { developer, isBlank } from "./model/values"

export type DeveloperTarget = `projectInfo.developer.${keyof DeveloperInfo}`

const DEVELOPER_TARGETS: Readonly<Record<DeveloperTarget, keyof DeveloperInfo>> = {
  "projectInfo.developer.id": "id",
  "projectInfo.developer.name": "name",
  "projectInfo.developer.email": "email",
  "projectInfo.developer.organization": "organization",
  "projectInfo.developer.organizationUrl": "organizationUrl",
}

/**
 * Where an external key lands. Developer targets together build a single
 * developer entry.
 */
export type MappingTarget = StringFieldPath | BooleanFieldPath | DeveloperTarget

export type PropertyMapping = Readonly<{
  key: string
  target: MappingTarget
}>

export const DEFAULT_PROPERTY_MAPPINGS: readonly PropertyMapping[] = [
  { key: "SONATYPE_USERNAME", target: "credentials.username" },
  { key: "SONATYPE_PASSWORD", target: "credentials.password" },
  { key: "POM_NAME", target: "projectInfo.name" },
  { key: "POM_DESCRIPTION", target: "projectInfo.description" },
  { key: "POM_URL", target: "projectInfo.url" },
  { key: "POM_SCM_URL", target: "projectInfo.scm.url" },
  { key: "POM_SCM_CONNECTION", target: "projectInfo.scm.connection" },
  { key: "POM_SCM_DEV_CONNECTION", target: "projectInfo.scm.developerConnection" },
  { key: "POM_LICENCE_NAME", target: "projectInfo.license.name" },
  { key: "POM_LICENCE_URL", target: "projectInfo.license.url" },
  { key: "POM_LICENCE_DIST", target: "projectInfo.license.distribution" },
  { key: "POM_ISSUE_SYSTEM", target: "projectInfo.issueManagement.system" },
  { key: "POM_ISSUE_URL", target: "projectInfo.issueManagement.url" },
  { key: "POM_DEVELOPER_ID", target: "projectInfo.developer.id" },
  { key: "POM_DEVELOPER_NAME", target: "projectInfo.developer.name" },
  { key: "POM_DEVELOPER_EMAIL", target: "projectInfo.developer.email" },
  { key: "POM_DEVELOPER_ORGANIZATION", target: "projectInfo.developer.organization" },
  {
    key: "POM_DEVELOPER_ORGANIZATION_URL",
    target: "projectInfo.developer.organizationUrl",
  },
  { key: "signing.keyId", target: "signing.keyId" },
  { key: "signing.password", target: "signing.password" },
  { key: "signing.secretKeyRingFile", target: "signing.secretKeyRingFile" },
  { key: "autoPublish", target: "publishing.autoPublish" },
  { key: "aggregation", target: "publishing.aggregation" },
  { key: "dryRun", target: "publishing.dryRun" },
]

export const ENVIRONMENT_MAPPINGS: readonly PropertyMapping[] = [
  { key: "SONATYPE_USERNAME", target: "credentials.username" },
  { key: "SONATYPE_PASSWORD", target: "credentials.password" },
  { key: "SIGNING_KEY", target: "signing.keyId" },
  { key: "SIGNING_PASSWORD", target: "signing.password" },
]

export type MappedEntries = Readonly<{
  partial: PartialConfig
  warnings: readonly LoadWarning[]
}>

function isDeveloperTarget(target: MappingTarget): target is DeveloperTarget {
  return Object.hasOwn(DEVELOPER_TARGETS, target)
}

export function parseBoolean(raw: string): boolean | undefined {
  switch (raw.trim().toLowerCase()) {
    case "true":
      return true
    case "false":
      return false
    default:
      return undefined
  }
}

/**
 * Interprets raw key/value entries through a mapping table.
 *
 * Unmapped keys are ignored and blank values count as unset. A boolean
 * target that is neither `true` nor `false` yields a `malformed_entry`
 * warning and stays unset. Other values are kept verbatim (trimmed).
 */
export function applyMappings(
  entries: Readonly<Record<string, string | undefined>>,
  mappings: readonly PropertyMapping[],
  source: ConfigurationSource,
): MappedEntries {
  const values: FieldValues = {}
  const dev: Partial<Record<keyof DeveloperInfo, string>> = {}
  const warnings: LoadWarning[] = []

  for (const { key, target } of mappings) {
    const raw = entries[key]
    if (raw === undefined || isBlank(raw)) continue

    const value = raw.trim()

    if (isDeveloperTarget(target)) {
      dev[DEVELOPER_TARGETS[target]] = value
    } else if (isBooleanField(target)) {
      const parsed = parseBoolean(value)

      if (parsed === undefined) {
        warnings.push({
          source,
          code: "malformed_entry",
          key,
          message: `Expected "true" or "false" for ${key}, got "${value}"`,
        })
      } else {
        values[target] = parsed
      }
    } else {
      values[target] = value
    }
  }

  if (Object.keys(dev).length > 0) {
    values["projectInfo.developers"] = [developer(dev)]
  }

  return { partial: toPartial(values), warnings }
}
