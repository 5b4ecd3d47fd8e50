import { z } from "zod"
import { SOURCE_PRECEDENCE } from "../../ports/source"
import { ConfigurationError } from "../errors"
import type { PublisherConfig } from "./types"
import { deepFreeze } from "./values"

const developerSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  organization: z.string(),
  organizationUrl: z.string(),
})

const publisherConfigSchema = z.object({
  credentials: z.object({ username: z.string(), password: z.string() }),
  projectInfo: z.object({
    name: z.string(),
    description: z.string(),
    url: z.string(),
    scm: z.object({
      url: z.string(),
      connection: z.string(),
      developerConnection: z.string(),
    }),
    license: z.object({ name: z.string(), url: z.string(), distribution: z.string() }),
    issueManagement: z.object({ system: z.string(), url: z.string() }),
    developers: z.array(developerSchema),
  }),
  signing: z.object({
    keyId: z.string(),
    password: z.string(),
    secretKeyRingFile: z.string(),
  }),
  publishing: z.object({
    autoPublish: z.boolean(),
    aggregation: z.boolean(),
    dryRun: z.boolean(),
    publications: z.array(z.string()),
    excludeModules: z.array(z.string()),
  }),
  validation: z.object({
    enabled: z.boolean(),
    strictMode: z.boolean(),
    requireCredentials: z.boolean(),
  }),
  autoDetection: z.object({
    projectInfo: z.boolean(),
    gitInfo: z.boolean(),
    credentials: z.boolean(),
    signing: z.boolean(),
  }),
  metadata: z.object({
    sources: z.array(z.enum(SOURCE_PRECEDENCE)),
    lastModified: z.string(),
    schemaVersion: z.string(),
  }),
})

export function serializeConfig(config: PublisherConfig): string {
  return JSON.stringify(config, null, 2)
}

/**
 * Parses a configuration previously written by {@link serializeConfig}.
 *
 * @throws ConfigurationError `invalid_configuration` when the text is not
 * JSON or does not have the configuration's shape.
 */
export function deserializeConfig(json: string): PublisherConfig {
  let raw: unknown

  try {
    raw = JSON.parse(json)
  } catch (err) {
    throw new ConfigurationError("Configuration is not valid JSON", {
      code: "invalid_configuration",
      cause: err,
    })
  }

  const result = publisherConfigSchema.safeParse(raw)

  if (!result.success) {
    throw new ConfigurationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      {
        code: "invalid_configuration",
        context: { issues: result.error.issues.map((i) => i.path.map(String).join(".")) },
      },
    )
  }

  const config: PublisherConfig = result.data

  return deepFreeze(config)
}
