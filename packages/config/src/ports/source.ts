/**
 * Where a configuration value came from.
 *
 * Listed lowest to highest precedence. Exactly one source wins per field.
 */
export const ConfigurationSource = {
  DEFAULTS: "DEFAULTS",
  SMART_DEFAULTS: "SMART_DEFAULTS",
  AUTO_DETECTED: "AUTO_DETECTED",
  ENVIRONMENT: "ENVIRONMENT",
  PROPERTIES: "PROPERTIES",
  DSL: "DSL",
} as const

export type ConfigurationSource = (typeof ConfigurationSource)[keyof typeof ConfigurationSource]

export const SOURCE_PRECEDENCE = [
  "DEFAULTS",
  "SMART_DEFAULTS",
  "AUTO_DETECTED",
  "ENVIRONMENT",
  "PROPERTIES",
  "DSL",
] as const satisfies readonly ConfigurationSource[]

export function precedenceOf(source: ConfigurationSource): number {
  return SOURCE_PRECEDENCE.indexOf(source)
}

/** Ascending precedence comparator. */
export function compareSources(a: ConfigurationSource, b: ConfigurationSource): number {
  return precedenceOf(a) - precedenceOf(b)
}
