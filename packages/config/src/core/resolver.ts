import os from "node:os"
import { type Clock, SystemClock } from "@sigil/clock"
import { type Logger, NullLogger } from "@sigil/logger"
import { AutoDetectionLoader } from "../adapters/auto-detection/auto-detection-loader"
import { DslLoader } from "../adapters/dsl/dsl-loader"
import { EnvironmentLoader } from "../adapters/environment/environment-loader"
import { PropertiesLoader } from "../adapters/properties/properties-loader"
import { GenericProjectDefaultProvider } from "../adapters/smart-defaults/generic-project-provider"
import { SmartDefaultsLoader } from "../adapters/smart-defaults/smart-defaults-loader"
import type { SmartDefaultProvider } from "../ports/defaults-provider"
import type { AutoDetector, DetectedValues, ProjectContext } from "../ports/detector"
import type { LoadResult, LoadWarning } from "../ports/loader"
import { type PropertiesFileCache, sharedFileCache } from "./cache/properties-file-cache"
import { Diagnostics } from "./diagnostics"
import { DEFAULT_PROPERTY_MAPPINGS, type PropertyMapping } from "./mapping"
import { type Layer, mergeLayers } from "./merge"
import { buildConfig } from "./model/field-paths"
import type { PartialConfig } from "./model/types"
import { ResolvedConfig } from "./resolved-config"
import { blockingErrors, type ValidationError, validateConfig } from "./validate"

export interface ResolverDeps {
  /**
   * Cache for parsed properties files.
   * @default sharedFileCache()
   */
  fileCache?: PropertiesFileCache

  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>

  /**
   * Detectors run when auto-detection is enabled, in this order.
   * @default []
   */
  detectors?: readonly AutoDetector[]

  /** @default [GenericProjectDefaultProvider] */
  defaultProviders?: readonly SmartDefaultProvider[]

  /** @default DEFAULT_PROPERTY_MAPPINGS */
  propertyMappings?: readonly PropertyMapping[]

  /** @default NullLogger */
  logger?: Logger

  /** Source of `metadata.lastModified`. @default SystemClock */
  clock?: Clock

  /** Home directory for the default keyring path. @default os.homedir() */
  homeDir?: string
}

export type ResolvedResolverDeps = Readonly<Required<ResolverDeps>>

export function resolveResolverDeps(deps: ResolverDeps = {}): ResolvedResolverDeps {
  const homeDir = deps.homeDir ?? os.homedir()

  return {
    fileCache: deps.fileCache ?? sharedFileCache(),
    env: deps.env ?? process.env,
    detectors: deps.detectors ?? [],
    defaultProviders: deps.defaultProviders ?? [new GenericProjectDefaultProvider({ homeDir })],
    propertyMappings: deps.propertyMappings ?? DEFAULT_PROPERTY_MAPPINGS,
    logger: deps.logger ?? new NullLogger(),
    clock: deps.clock ?? new SystemClock(),
    homeDir,
  }
}

export interface ResolveRequest {
  /** Configuration written by the user, usually from `defineConfig`. */
  explicit?: PartialConfig

  /** Properties file to read. Relative paths resolve against the cwd. */
  propertiesFile?: string

  /**
   * Run detectors. Needs `project`.
   * @default true
   */
  enableAutoDetection?: boolean

  /**
   * The project being configured. Without it neither detectors nor smart
   * defaults run.
   */
  project?: ProjectContext

  /**
   * Validate the result. Skipped as well when `validation.enabled` is false.
   * @default true
   */
  validate?: boolean

  /** Report validation problems of the properties file as load warnings. */
  validateOnLoad?: boolean

  /** @default config.validation.requireCredentials */
  requireCredentials?: boolean
}

export interface ResolvedConfiguration {
  config: ResolvedConfig
  diagnostics: Diagnostics
  /** Every violation, warnings included; see `blockingErrors`. */
  validationErrors: ValidationError[]
  warnings: LoadWarning[]
  /**
   * What the detectors reported per field, with origin and confidence. Empty
   * when auto-detection did not run.
   */
  detectedValues: DetectedValues
}

/**
 * Resolves publishing configuration from every source.
 *
 * Loaders run as auto-detection, smart defaults, environment, properties,
 * explicit. Layers are then merged in ascending precedence, so explicit
 * configuration wins over everything and smart defaults lose to everything.
 * Each call gets its own {@link Diagnostics}; the file cache is the only
 * state shared between calls.
 */
export class ConfigurationResolver {
  private readonly deps: ResolvedResolverDeps
  private readonly logger: Logger

  constructor(deps: ResolverDeps = {}) {
    this.deps = resolveResolverDeps(deps)
    this.logger = this.deps.logger.child({ component: "config-resolver" })
  }

  async resolve(request: ResolveRequest = {}): Promise<ResolvedConfiguration> {
    const { clock } = this.deps
    const startedAt = clock.nowMs()
    const log = request.project
      ? this.logger.child({ project: request.project.name })
      : this.logger

    const { results, detectedValues } = await this.runLoaders(request)
    const diagnostics = new Diagnostics()
    const warnings: LoadWarning[] = []
    const layers: Layer[] = []

    for (const result of results) {
      for (const warning of result.warnings) {
        warnings.push(warning)
        log.warn(warning.message, {
          source: warning.source,
          code: warning.code,
          ...(warning.key !== undefined && { key: warning.key }),
          ...(warning.path !== undefined && { path: warning.path }),
        })
      }

      const count = diagnostics.recordPartial(result.partial, result.source)

      if (count === 0) {
        log.debug("Skipped empty configuration layer", { source: result.source })
        continue
      }

      layers.push({ source: result.source, partial: result.partial })
      log.debug("Applied configuration layer", { source: result.source, count })
    }

    const value = buildConfig(mergeLayers(layers), {
      sources: diagnostics.sourcesUsed(),
      lastModified: clock.timestamp(),
    })

    const validationErrors =
      request.validate !== false && value.validation.enabled
        ? validateConfig(value, { requireCredentials: request.requireCredentials })
        : []

    log.info("Resolved configuration", {
      sources: value.metadata.sources,
      count: warnings.length,
      errors: blockingErrors(validationErrors).length,
      violations: validationErrors.length,
      durationMs: clock.nowMs() - startedAt,
    })

    return {
      config: new ResolvedConfig(value, diagnostics),
      diagnostics,
      validationErrors,
      warnings,
      detectedValues,
    }
  }

  /** Loader results in run order, plus the detectors' value provenance. */
  private async runLoaders(
    request: ResolveRequest,
  ): Promise<{ results: LoadResult[]; detectedValues: DetectedValues }> {
    const { project, explicit, propertiesFile } = request
    const results: LoadResult[] = []

    let detected: PartialConfig = {}
    let detectedValues: DetectedValues = {}

    if (project && request.enableAutoDetection !== false) {
      const explicitToggles = explicit?.autoDetection
      const result = await new AutoDetectionLoader(this.deps.detectors).load({
        project,
        ...(explicitToggles && { settings: explicitToggles }),
      })

      detected = result.partial
      detectedValues = result.detectedValues
      results.push(result)
    }

    if (project) {
      results.push(
        await new SmartDefaultsLoader(this.deps.defaultProviders).load({
          project,
          current: detected,
        }),
      )
    }

    results.push(await new EnvironmentLoader({ env: this.deps.env }).load())

    if (propertiesFile !== undefined) {
      const loader = new PropertiesLoader({
        fileCache: this.deps.fileCache,
        mappings: this.deps.propertyMappings,
        validateOnLoad: request.validateOnLoad ?? false,
      })

      results.push(await loader.load(propertiesFile))
    }

    if (explicit) {
      results.push(await new DslLoader().load(explicit))
    }

    return { results, detectedValues }
  }
}

/**
 * One-shot resolution with a fresh {@link ConfigurationResolver}.
 */
export function resolveConfiguration(
  request: ResolveRequest = {},
  deps: ResolverDeps = {},
): Promise<ResolvedConfiguration> {
  return new ConfigurationResolver(deps).resolve(request)
}
