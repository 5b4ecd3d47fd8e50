import type {
  AutoDetectionSettings,
  ConfigMetadata,
  Credentials,
  DeveloperInfo,
  IssueManagement,
  LicenseInfo,
  PartialConfig,
  ProjectInfo,
  PublisherConfig,
  PublishingConfig,
  ScmInfo,
  SigningConfig,
  ValidationSettings,
} from "./types"
import { SCHEMA_VERSION } from "./types"
import { deepFreeze, developer, isEmptyDeveloper, normalizeSet } from "./values"

/**
 * Value type of every leaf, keyed by its dotted path.
 */
export interface FieldTypes {
  "credentials.username": string
  "credentials.password": string
  "projectInfo.name": string
  "projectInfo.description": string
  "projectInfo.url": string
  "projectInfo.scm.url": string
  "projectInfo.scm.connection": string
  "projectInfo.scm.developerConnection": string
  "projectInfo.license.name": string
  "projectInfo.license.url": string
  "projectInfo.license.distribution": string
  "projectInfo.issueManagement.system": string
  "projectInfo.issueManagement.url": string
  "projectInfo.developers": readonly DeveloperInfo[]
  "signing.keyId": string
  "signing.password": string
  "signing.secretKeyRingFile": string
  "publishing.autoPublish": boolean
  "publishing.aggregation": boolean
  "publishing.dryRun": boolean
  "publishing.publications": readonly string[]
  "publishing.excludeModules": readonly string[]
  "validation.enabled": boolean
  "validation.strictMode": boolean
  "validation.requireCredentials": boolean
  "autoDetection.projectInfo": boolean
  "autoDetection.gitInfo": boolean
  "autoDetection.credentials": boolean
  "autoDetection.signing": boolean
}

export type FieldPath = keyof FieldTypes
export type FieldValue = FieldTypes[FieldPath]

export type StringFieldPath = {
  [P in FieldPath]: FieldTypes[P] extends string ? P : never
}[FieldPath]

export type BooleanFieldPath = {
  [P in FieldPath]: FieldTypes[P] extends boolean ? P : never
}[FieldPath]

/** Set leaves of one partial, keyed by path. */
export type FieldValues = { [P in FieldPath]?: FieldTypes[P] }

export const FIELD_PATHS = [
  "credentials.username",
  "credentials.password",
  "projectInfo.name",
  "projectInfo.description",
  "projectInfo.url",
  "projectInfo.scm.url",
  "projectInfo.scm.connection",
  "projectInfo.scm.developerConnection",
  "projectInfo.license.name",
  "projectInfo.license.url",
  "projectInfo.license.distribution",
  "projectInfo.issueManagement.system",
  "projectInfo.issueManagement.url",
  "projectInfo.developers",
  "signing.keyId",
  "signing.password",
  "signing.secretKeyRingFile",
  "publishing.autoPublish",
  "publishing.aggregation",
  "publishing.dryRun",
  "publishing.publications",
  "publishing.excludeModules",
  "validation.enabled",
  "validation.strictMode",
  "validation.requireCredentials",
  "autoDetection.projectInfo",
  "autoDetection.gitInfo",
  "autoDetection.credentials",
  "autoDetection.signing",
] as const satisfies readonly FieldPath[]

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

/** Flat, mutable staging area used while building a partial. */
export type PartialDraft = {
  credentials: Partial<Mutable<Credentials>>
  projectInfo: Partial<Mutable<Pick<ProjectInfo, "name" | "description" | "url" | "developers">>>
  scm: Partial<Mutable<ScmInfo>>
  license: Partial<Mutable<LicenseInfo>>
  issueManagement: Partial<Mutable<IssueManagement>>
  signing: Partial<Mutable<SigningConfig>>
  publishing: Partial<Mutable<PublishingConfig>>
  validation: Partial<Mutable<ValidationSettings>>
  autoDetection: Partial<Mutable<AutoDetectionSettings>>
}

export type FieldKind = "string" | "boolean" | "list" | "developers"

export interface FieldSpec<V> {
  readonly kind: FieldKind
  readonly defaultValue: V
  /** Never shown or logged in full. */
  readonly secret: boolean
  get(config: PublisherConfig): V
  read(partial: PartialConfig): V | undefined
  write(draft: PartialDraft, value: V): void
}

function stringField(
  get: (config: PublisherConfig) => string,
  read: (partial: PartialConfig) => string | undefined,
  write: (draft: PartialDraft, value: string) => void,
  secret = false,
): FieldSpec<string> {
  return { kind: "string", defaultValue: "", secret, get, read, write }
}

function booleanField(
  defaultValue: boolean,
  get: (config: PublisherConfig) => boolean,
  read: (partial: PartialConfig) => boolean | undefined,
  write: (draft: PartialDraft, value: boolean) => void,
): FieldSpec<boolean> {
  return { kind: "boolean", defaultValue, secret: false, get, read, write }
}

function listField(
  get: (config: PublisherConfig) => readonly string[],
  read: (partial: PartialConfig) => readonly string[] | undefined,
  write: (draft: PartialDraft, value: readonly string[]) => void,
): FieldSpec<readonly string[]> {
  return {
    kind: "list",
    defaultValue: [],
    secret: false,
    get,
    read: (partial) => {
      const values = read(partial)
      return values && normalizeSet(values)
    },
    write,
  }
}

export const FIELD_SPECS: { readonly [P in FieldPath]: FieldSpec<FieldTypes[P]> } = {
  "credentials.username": stringField(
    (c) => c.credentials.username,
    (p) => p.credentials?.username,
    (d, v) => {
      d.credentials.username = v
    },
  ),
  "credentials.password": stringField(
    (c) => c.credentials.password,
    (p) => p.credentials?.password,
    (d, v) => {
      d.credentials.password = v
    },
    true,
  ),
  "projectInfo.name": stringField(
    (c) => c.projectInfo.name,
    (p) => p.projectInfo?.name,
    (d, v) => {
      d.projectInfo.name = v
    },
  ),
  "projectInfo.description": stringField(
    (c) => c.projectInfo.description,
    (p) => p.projectInfo?.description,
    (d, v) => {
      d.projectInfo.description = v
    },
  ),
  "projectInfo.url": stringField(
    (c) => c.projectInfo.url,
    (p) => p.projectInfo?.url,
    (d, v) => {
      d.projectInfo.url = v
    },
  ),
  "projectInfo.scm.url": stringField(
    (c) => c.projectInfo.scm.url,
    (p) => p.projectInfo?.scm?.url,
    (d, v) => {
      d.scm.url = v
    },
  ),
  "projectInfo.scm.connection": stringField(
    (c) => c.projectInfo.scm.connection,
    (p) => p.projectInfo?.scm?.connection,
    (d, v) => {
      d.scm.connection = v
    },
  ),
  "projectInfo.scm.developerConnection": stringField(
    (c) => c.projectInfo.scm.developerConnection,
    (p) => p.projectInfo?.scm?.developerConnection,
    (d, v) => {
      d.scm.developerConnection = v
    },
  ),
  "projectInfo.license.name": stringField(
    (c) => c.projectInfo.license.name,
    (p) => p.projectInfo?.license?.name,
    (d, v) => {
      d.license.name = v
    },
  ),
  "projectInfo.license.url": stringField(
    (c) => c.projectInfo.license.url,
    (p) => p.projectInfo?.license?.url,
    (d, v) => {
      d.license.url = v
    },
  ),
  "projectInfo.license.distribution": stringField(
    (c) => c.projectInfo.license.distribution,
    (p) => p.projectInfo?.license?.distribution,
    (d, v) => {
      d.license.distribution = v
    },
  ),
  "projectInfo.issueManagement.system": stringField(
    (c) => c.projectInfo.issueManagement.system,
    (p) => p.projectInfo?.issueManagement?.system,
    (d, v) => {
      d.issueManagement.system = v
    },
  ),
  "projectInfo.issueManagement.url": stringField(
    (c) => c.projectInfo.issueManagement.url,
    (p) => p.projectInfo?.issueManagement?.url,
    (d, v) => {
      d.issueManagement.url = v
    },
  ),
  "projectInfo.developers": {
    kind: "developers",
    defaultValue: [],
    secret: false,
    get: (c) => c.projectInfo.developers,
    read: (p) =>
      p.projectInfo?.developers
        ?.filter((dev) => !isEmptyDeveloper(dev))
        .map((dev) => developer(dev)),
    write: (d, v) => {
      d.projectInfo.developers = v
    },
  },
  "signing.keyId": stringField(
    (c) => c.signing.keyId,
    (p) => p.signing?.keyId,
    (d, v) => {
      d.signing.keyId = v
    },
    true,
  ),
  "signing.password": stringField(
    (c) => c.signing.password,
    (p) => p.signing?.password,
    (d, v) => {
      d.signing.password = v
    },
    true,
  ),
  "signing.secretKeyRingFile": stringField(
    (c) => c.signing.secretKeyRingFile,
    (p) => p.signing?.secretKeyRingFile,
    (d, v) => {
      d.signing.secretKeyRingFile = v
    },
  ),
  "publishing.autoPublish": booleanField(
    false,
    (c) => c.publishing.autoPublish,
    (p) => p.publishing?.autoPublish,
    (d, v) => {
      d.publishing.autoPublish = v
    },
  ),
  "publishing.aggregation": booleanField(
    true,
    (c) => c.publishing.aggregation,
    (p) => p.publishing?.aggregation,
    (d, v) => {
      d.publishing.aggregation = v
    },
  ),
  "publishing.dryRun": booleanField(
    false,
    (c) => c.publishing.dryRun,
    (p) => p.publishing?.dryRun,
    (d, v) => {
      d.publishing.dryRun = v
    },
  ),
  "publishing.publications": listField(
    (c) => c.publishing.publications,
    (p) => p.publishing?.publications,
    (d, v) => {
      d.publishing.publications = v
    },
  ),
  "publishing.excludeModules": listField(
    (c) => c.publishing.excludeModules,
    (p) => p.publishing?.excludeModules,
    (d, v) => {
      d.publishing.excludeModules = v
    },
  ),
  "validation.enabled": booleanField(
    true,
    (c) => c.validation.enabled,
    (p) => p.validation?.enabled,
    (d, v) => {
      d.validation.enabled = v
    },
  ),
  "validation.strictMode": booleanField(
    false,
    (c) => c.validation.strictMode,
    (p) => p.validation?.strictMode,
    (d, v) => {
      d.validation.strictMode = v
    },
  ),
  "validation.requireCredentials": booleanField(
    false,
    (c) => c.validation.requireCredentials,
    (p) => p.validation?.requireCredentials,
    (d, v) => {
      d.validation.requireCredentials = v
    },
  ),
  "autoDetection.projectInfo": booleanField(
    true,
    (c) => c.autoDetection.projectInfo,
    (p) => p.autoDetection?.projectInfo,
    (d, v) => {
      d.autoDetection.projectInfo = v
    },
  ),
  "autoDetection.gitInfo": booleanField(
    true,
    (c) => c.autoDetection.gitInfo,
    (p) => p.autoDetection?.gitInfo,
    (d, v) => {
      d.autoDetection.gitInfo = v
    },
  ),
  "autoDetection.credentials": booleanField(
    true,
    (c) => c.autoDetection.credentials,
    (p) => p.autoDetection?.credentials,
    (d, v) => {
      d.autoDetection.credentials = v
    },
  ),
  "autoDetection.signing": booleanField(
    true,
    (c) => c.autoDetection.signing,
    (p) => p.autoDetection?.signing,
    (d, v) => {
      d.autoDetection.signing = v
    },
  ),
}

export function isFieldPath(value: string): value is FieldPath {
  return Object.hasOwn(FIELD_SPECS, value)
}

export function isBooleanField(path: FieldPath): path is BooleanFieldPath {
  return FIELD_SPECS[path].kind === "boolean"
}

export function isSecretField(path: FieldPath): boolean {
  return FIELD_SPECS[path].secret
}

/**
 * Whether a value counts as "set": non-blank strings, non-empty lists,
 * and any boolean.
 */
export function isSetValue(value: FieldValue | undefined): boolean {
  if (value === undefined) return false
  if (typeof value === "string") return value.trim() !== ""
  if (typeof value === "boolean") return true

  return value.length > 0
}

function readField<P extends FieldPath>(
  partial: PartialConfig,
  path: P,
  into: FieldValues,
): void {
  const value = FIELD_SPECS[path].read(partial)

  if (value !== undefined && isSetValue(value)) {
    into[path] = value
  }
}

function writeField<P extends FieldPath>(
  draft: PartialDraft,
  values: FieldValues,
  path: P,
): void {
  const value = values[path]

  if (value !== undefined) {
    FIELD_SPECS[path].write(draft, value)
  }
}

function valueOrDefault<P extends FieldPath>(values: FieldValues, path: P): FieldTypes[P] {
  return values[path] ?? FIELD_SPECS[path].defaultValue
}

/**
 * Set leaves of a partial, in {@link FIELD_PATHS} order. Unset leaves are
 * absent from the result.
 */
export function flattenPartial(partial: PartialConfig): FieldValues {
  const values: FieldValues = {}

  for (const path of FIELD_PATHS) {
    readField(partial, path, values)
  }

  return values
}

export function isEmptyPartial(partial: PartialConfig): boolean {
  return Object.keys(flattenPartial(partial)).length === 0
}

function hasKeys(section: object): boolean {
  return Object.keys(section).length > 0
}

/** Inverse of {@link flattenPartial}. Empty sections are omitted. */
export function toPartial(values: FieldValues): PartialConfig {
  const draft: PartialDraft = {
    credentials: {},
    projectInfo: {},
    scm: {},
    license: {},
    issueManagement: {},
    signing: {},
    publishing: {},
    validation: {},
    autoDetection: {},
  }

  for (const path of FIELD_PATHS) {
    writeField(draft, values, path)
  }

  const projectInfo = {
    ...draft.projectInfo,
    ...(hasKeys(draft.scm) && { scm: draft.scm }),
    ...(hasKeys(draft.license) && { license: draft.license }),
    ...(hasKeys(draft.issueManagement) && { issueManagement: draft.issueManagement }),
  }

  return deepFreeze({
    ...(hasKeys(draft.credentials) && { credentials: draft.credentials }),
    ...(hasKeys(projectInfo) && { projectInfo }),
    ...(hasKeys(draft.signing) && { signing: draft.signing }),
    ...(hasKeys(draft.publishing) && { publishing: draft.publishing }),
    ...(hasKeys(draft.validation) && { validation: draft.validation }),
    ...(hasKeys(draft.autoDetection) && { autoDetection: draft.autoDetection }),
  })
}

export const EPOCH_ISO = new Date(0).toISOString()

/**
 * Fills every unset leaf of `partial` with its type default.
 */
export function buildConfig(partial: PartialConfig, metadata: Partial<ConfigMetadata> = {}): PublisherConfig {
  const values = flattenPartial(partial)
  const val = <P extends FieldPath>(path: P) => valueOrDefault(values, path)

  return deepFreeze({
    credentials: {
      username: val("credentials.username"),
      password: val("credentials.password"),
    },
    projectInfo: {
      name: val("projectInfo.name"),
      description: val("projectInfo.description"),
      url: val("projectInfo.url"),
      scm: {
        url: val("projectInfo.scm.url"),
        connection: val("projectInfo.scm.connection"),
        developerConnection: val("projectInfo.scm.developerConnection"),
      },
      license: {
        name: val("projectInfo.license.name"),
        url: val("projectInfo.license.url"),
        distribution: val("projectInfo.license.distribution"),
      },
      issueManagement: {
        system: val("projectInfo.issueManagement.system"),
        url: val("projectInfo.issueManagement.url"),
      },
      developers: val("projectInfo.developers"),
    },
    signing: {
      keyId: val("signing.keyId"),
      password: val("signing.password"),
      secretKeyRingFile: val("signing.secretKeyRingFile"),
    },
    publishing: {
      autoPublish: val("publishing.autoPublish"),
      aggregation: val("publishing.aggregation"),
      dryRun: val("publishing.dryRun"),
      publications: val("publishing.publications"),
      excludeModules: val("publishing.excludeModules"),
    },
    validation: {
      enabled: val("validation.enabled"),
      strictMode: val("validation.strictMode"),
      requireCredentials: val("validation.requireCredentials"),
    },
    autoDetection: {
      projectInfo: val("autoDetection.projectInfo"),
      gitInfo: val("autoDetection.gitInfo"),
      credentials: val("autoDetection.credentials"),
      signing: val("autoDetection.signing"),
    },
    metadata: {
      sources: [...(metadata.sources ?? [])],
      lastModified: metadata.lastModified ?? EPOCH_ISO,
      schemaVersion: metadata.schemaVersion ?? SCHEMA_VERSION,
    },
  })
}

export function getField<P extends FieldPath>(config: PublisherConfig, path: P): FieldTypes[P] {
  return FIELD_SPECS[path].get(config)
}

export function defaultValueOf<P extends FieldPath>(path: P): FieldTypes[P] {
  return FIELD_SPECS[path].defaultValue
}
