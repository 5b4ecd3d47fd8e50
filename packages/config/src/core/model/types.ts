import type { ConfigurationSource } from "../../ports/source"

export type Credentials = Readonly<{
  username: string
  password: string
}>

export type DeveloperInfo = Readonly<{
  id: string
  name: string
  email: string
  organization: string
  organizationUrl: string
}>

export type ScmInfo = Readonly<{
  url: string
  connection: string
  developerConnection: string
}>

export type LicenseInfo = Readonly<{
  name: string
  url: string
  distribution: string
}>

export type IssueManagement = Readonly<{
  system: string
  url: string
}>

export type ProjectInfo = Readonly<{
  name: string
  description: string
  url: string
  scm: ScmInfo
  license: LicenseInfo
  issueManagement: IssueManagement
  /** Keyed by position. A non-empty list from a higher source replaces this one whole. */
  developers: readonly DeveloperInfo[]
}>

export type SigningConfig = Readonly<{
  keyId: string
  password: string
  secretKeyRingFile: string
}>

export type PublishingConfig = Readonly<{
  autoPublish: boolean
  aggregation: boolean
  dryRun: boolean
  /** Sorted, no duplicates. */
  publications: readonly string[]
  /** Sorted, no duplicates. */
  excludeModules: readonly string[]
}>

export type ValidationSettings = Readonly<{
  enabled: boolean
  strictMode: boolean
  requireCredentials: boolean
}>

export type AutoDetectionSettings = Readonly<{
  projectInfo: boolean
  gitInfo: boolean
  credentials: boolean
  signing: boolean
}>

export type ConfigMetadata = Readonly<{
  /** Sources that set at least one field, in precedence order. */
  sources: readonly ConfigurationSource[]
  /** ISO-8601 timestamp of the resolution. */
  lastModified: string
  schemaVersion: string
}>

export type PublisherConfig = Readonly<{
  credentials: Credentials
  projectInfo: ProjectInfo
  signing: SigningConfig
  publishing: PublishingConfig
  validation: ValidationSettings
  autoDetection: AutoDetectionSettings
  metadata: ConfigMetadata
}>

/**
 * What one source knows about the configuration.
 *
 * Every leaf is optional. A string counts as set only when it is not blank
 * and a list only when it is not empty. Booleans are tri-state: absent means
 * "not mentioned", `false` is an explicit value.
 */
export type PartialConfig = Readonly<{
  credentials?: Partial<Credentials>
  projectInfo?: Readonly<{
    name?: string
    description?: string
    url?: string
    scm?: Partial<ScmInfo>
    license?: Partial<LicenseInfo>
    issueManagement?: Partial<IssueManagement>
    developers?: readonly DeveloperInfo[]
  }>
  signing?: Partial<SigningConfig>
  publishing?: Partial<PublishingConfig>
  validation?: Partial<ValidationSettings>
  autoDetection?: Partial<AutoDetectionSettings>
}>

export const SCHEMA_VERSION = "1.0.0"
