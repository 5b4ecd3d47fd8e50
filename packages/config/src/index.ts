export {
  type AutoDetectionInput,
  AutoDetectionLoader,
  type AutoDetectionLoadResult,
} from "./adapters/auto-detection/auto-detection-loader"
export { DslLoader } from "./adapters/dsl/dsl-loader"
export {
  EnvironmentLoader,
  type EnvironmentLoaderOptions,
} from "./adapters/environment/environment-loader"
export {
  PropertiesLoader,
  type PropertiesLoaderOptions,
} from "./adapters/properties/properties-loader"
export {
  APACHE_LICENSE,
  GenericProjectDefaultProvider,
  type GenericProjectProviderOptions,
  inferProjectName,
} from "./adapters/smart-defaults/generic-project-provider"
export {
  SmartDefaultsLoader,
  type SmartDefaultsInput,
} from "./adapters/smart-defaults/smart-defaults-loader"

export {
  PropertiesFileCache,
  type PropertiesEntries,
  type PropertiesParser,
  readPropertiesFile,
  sharedFileCache,
} from "./core/cache/properties-file-cache"
export { Diagnostics, type DiagnosticsReportRow, type RecordedValue } from "./core/diagnostics"
export {
  assertValid,
  ConfigurationError,
  type ConfigurationErrorCode,
  ConfigurationValidationError,
} from "./core/errors"
export {
  applyMappings,
  DEFAULT_PROPERTY_MAPPINGS,
  ENVIRONMENT_MAPPINGS,
  type MappingTarget,
  parseBoolean,
  type PropertyMapping,
} from "./core/mapping"
export { formatFieldValue, MASK, maskSecret } from "./core/mask"
export { type Layer, mergeLayers, mergePartials } from "./core/merge"
export { type ConfigInput, defineConfig, emptyConfig } from "./core/model/define"
export {
  buildConfig,
  FIELD_PATHS,
  type FieldPath,
  type FieldTypes,
  type FieldValue,
  type FieldValues,
  flattenPartial,
  getField,
  isEmptyPartial,
  isFieldPath,
  isSetValue,
  toPartial,
} from "./core/model/field-paths"
export { deserializeConfig, serializeConfig } from "./core/model/serialize"
export type {
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
} from "./core/model/types"
export { SCHEMA_VERSION } from "./core/model/types"
export { developer, normalizeSet } from "./core/model/values"
export { ResolvedConfig } from "./core/resolved-config"
export {
  ConfigurationResolver,
  resolveConfiguration,
  type ResolvedConfiguration,
  type ResolvedResolverDeps,
  type ResolveRequest,
  type ResolverDeps,
  resolveResolverDeps,
} from "./core/resolver"
export {
  blockingErrors,
  type ValidateOptions,
  type ValidationError,
  type ValidationErrorCode,
  type ValidationSeverity,
  validateConfig,
} from "./core/validate"

export type { IResolvedConfig } from "./ports/config"
export type { SmartDefaultProvider } from "./ports/defaults-provider"
export {
  type AutoDetector,
  compareConfidence,
  type Confidence,
  CONFIDENCE_LEVELS,
  type DetectedValue,
  type DetectedValues,
  type DetectionResult,
  type DetectorCategory,
  type ProjectContext,
} from "./ports/detector"
export type {
  LoadResult,
  LoadWarning,
  LoadWarningCode,
  SourceLoader,
} from "./ports/loader"
export {
  compareSources,
  ConfigurationSource,
  precedenceOf,
  SOURCE_PRECEDENCE,
} from "./ports/source"
