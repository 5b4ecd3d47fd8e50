import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { Writable } from "node:stream"
import { FakeClock } from "@sigil/clock"
import { PinoLogger } from "@sigil/logger"
import type { ProjectContext } from "../../ports/detector"
import { type ConfigurationSource, compareSources } from "../../ports/source"
import { PropertiesFileCache } from "../cache/properties-file-cache"
import { assertValid, ConfigurationValidationError } from "../errors"
import { defineConfig, emptyConfig } from "../model/define"
import { FIELD_PATHS, getField } from "../model/field-paths"
import { developer } from "../model/values"
import { ConfigurationResolver, resolveConfiguration, type ResolverDeps } from "../resolver"

describe("ConfigurationResolver e2e", () => {
  let cwd: string
  let propertiesFile: string
  let fileCache: PropertiesFileCache
  let clock: FakeClock

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "resolver-e2e-"))
    propertiesFile = path.join(cwd, "gradle.properties")
    fileCache = new PropertiesFileCache()
    clock = new FakeClock("2026-10-19T08:00:00.000Z")
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  function resolver(deps: ResolverDeps = {}) {
    return new ConfigurationResolver({ fileCache, clock, env: {}, homeDir: "/home/dev", ...deps })
  }

  function project(): ProjectContext {
    return { name: "widgets", directory: cwd }
  }

  describe("defaults", () => {
    it("returns the zero-value config for an empty explicit config and nothing else", async () => {
      const { config, warnings } = await resolver().resolve({ explicit: defineConfig({}) })

      const expected = emptyConfig()

      expect(config.value.credentials).toEqual(expected.credentials)
      expect(config.value.projectInfo).toEqual(expected.projectInfo)
      expect(config.value.signing).toEqual(expected.signing)
      expect(config.value.publishing).toEqual({
        autoPublish: false,
        aggregation: true,
        dryRun: false,
        publications: [],
        excludeModules: [],
      })
      expect(config.value.metadata.sources).toEqual([])
      expect(config.sourcesUsed()).toEqual([])
      expect(warnings).toEqual([])
    })

    it("stamps lastModified from the clock", async () => {
      const { config } = await resolver().resolve({})

      expect(config.value.metadata.lastModified).toBe("2026-10-19T08:00:00.000Z")
      expect(config.value.metadata.schemaVersion).toBe("1.0.0")
    })
  })

  describe("precedence", () => {
    it("lets explicit config beat environment and properties", async () => {
      await fs.writeFile(propertiesFile, "SONATYPE_USERNAME=props-user\n")

      const { config } = await resolver({
        env: { SONATYPE_USERNAME: "env-user", SONATYPE_PASSWORD: "env-password" },
      }).resolve({
        explicit: defineConfig({ credentials: { username: "dsl-user" } }),
        propertiesFile,
      })

      expect(config.get("credentials.username")).toBe("dsl-user")
      expect(config.get("credentials.password")).toBe("env-password")
      expect(new Set(config.value.metadata.sources)).toEqual(
        new Set(["DSL", "ENVIRONMENT", "PROPERTIES"]),
      )
      expect(config.explain("credentials.username")).toBe("DSL")
      expect(config.explain("credentials.password")).toBe("ENVIRONMENT")
    })

    it("orders every pair of sources by precedence", async () => {
      const ladder: [ConfigurationSource, string][] = [
        ["AUTO_DETECTED", "detected-user"],
        ["ENVIRONMENT", "env-user"],
        ["PROPERTIES", "props-user"],
        ["DSL", "dsl-user"],
      ]
      await fs.writeFile(propertiesFile, "SONATYPE_USERNAME=props-user\n")

      for (const [low, lowValue] of ladder) {
        for (const [high, highValue] of ladder) {
          if (low === high) continue

          const active = new Set([low, high])
          const { config } = await resolver({
            env: active.has("ENVIRONMENT") ? { SONATYPE_USERNAME: "env-user" } : {},
            detectors: active.has("AUTO_DETECTED")
              ? [
                  {
                    name: "credentials",
                    detect: () => ({ config: { credentials: { username: "detected-user" } } }),
                  },
                ]
              : [],
          }).resolve({
            project: project(),
            ...(active.has("PROPERTIES") && { propertiesFile }),
            ...(active.has("DSL") && {
              explicit: defineConfig({ credentials: { username: "dsl-user" } }),
            }),
          })

          const winner = compareSources(low, high) > 0 ? lowValue : highValue

          expect(config.get("credentials.username")).toBe(winner)
        }
      }
    })

    it("lets environment beat auto-detection and lose to properties", async () => {
      await fs.writeFile(propertiesFile, "SONATYPE_PASSWORD=props-password\n")

      const { config } = await resolver({
        env: { SONATYPE_USERNAME: "env-user", SONATYPE_PASSWORD: "env-password" },
        detectors: [
          {
            name: "credentials",
            detect: () => ({ config: { credentials: { username: "detected-user" } } }),
          },
        ],
      }).resolve({ project: project(), propertiesFile })

      expect(config.get("credentials.username")).toBe("env-user")
      expect(config.get("credentials.password")).toBe("props-password")
    })

    it("keeps an explicit false over a true from a lower source", async () => {
      await fs.writeFile(propertiesFile, "aggregation=true\n")

      const { config } = await resolver().resolve({
        explicit: defineConfig({ publishing: { aggregation: false } }),
        propertiesFile,
      })

      expect(config.get("publishing.aggregation")).toBe(false)
      expect(config.explain("publishing.aggregation")).toBe("DSL")
    })
  })

  describe("diagnostics", () => {
    it("agrees with the merged config on every field", async () => {
      await fs.writeFile(
        propertiesFile,
        "POM_NAME=props-name\nPOM_URL=https://example.com/widgets\nautoPublish=true\n",
      )

      const { config, diagnostics } = await resolver({
        env: { SONATYPE_USERNAME: "env-user", SIGNING_KEY: "ABCD1234" },
        detectors: [
          {
            name: "git",
            detect: () => ({
              config: {
                projectInfo: {
                  name: "detected-name",
                  scm: { url: "https://example.com/widgets.git" },
                  developers: [developer({ id: "jdoe" })],
                },
              },
            }),
          },
        ],
      }).resolve({
        project: project(),
        propertiesFile,
        explicit: defineConfig({
          credentials: { username: "dsl-user" },
          publishing: { aggregation: false },
        }),
      })

      for (const path of FIELD_PATHS) {
        expect(diagnostics.finalValue(path)).toEqual(getField(config.value, path))
        expect(config.explain(path)).toBe(diagnostics.explain(path))
      }

      expect(diagnostics.valuesFor("projectInfo.name")).toEqual([
        { value: "detected-name", source: "AUTO_DETECTED" },
        { value: "props-name", source: "PROPERTIES" },
      ])
      expect(config.sourcesUsed()).toEqual([
        "SMART_DEFAULTS",
        "AUTO_DETECTED",
        "ENVIRONMENT",
        "PROPERTIES",
        "DSL",
      ])
    })

    it("gives each resolution its own diagnostics", async () => {
      const r = resolver({ env: { SONATYPE_USERNAME: "env-user" } })

      const [a, b] = await Promise.all([
        r.resolve({ explicit: defineConfig({ projectInfo: { name: "a" } }) }),
        r.resolve({ explicit: defineConfig({ projectInfo: { name: "b" } }) }),
      ])

      expect(a.diagnostics).not.toBe(b.diagnostics)
      expect(a.diagnostics.valuesFor("projectInfo.name")).toEqual([{ value: "a", source: "DSL" }])
      expect(b.config.get("projectInfo.name")).toBe("b")
    })
  })

  describe("smart defaults and auto-detection", () => {
    it("keeps an auto-detected developer over smart defaults", async () => {
      const detected = developer({ id: "jdoe", name: "Jane Doe", email: "jdoe@example.com" })

      const { config } = await resolver({
        detectors: [
          {
            name: "project",
            category: "projectInfo",
            detect: () => ({ config: { projectInfo: { developers: [detected] } } }),
          },
        ],
        defaultProviders: [
          {
            name: "placeholder",
            priority: 10,
            canProvideDefaults: () => true,
            provideDefaults: () => ({
              projectInfo: { developers: [developer({ id: "placeholder" })] },
            }),
          },
        ],
      }).resolve({ project: project() })

      expect(config.get("projectInfo.developers")).toEqual([detected])
      expect(config.explain("projectInfo.developers")).toBe("AUTO_DETECTED")
    })

    it("fills project fields from the generic provider", async () => {
      const { config } = await resolver().resolve({ project: project() })

      expect(config.get("projectInfo.name")).toBe("widgets")
      expect(config.get("projectInfo.license.name")).toBe("Apache License 2.0")
      expect(config.get("signing.secretKeyRingFile")).toBe("/home/dev/.gnupg/secring.gpg")
      expect(config.explain("projectInfo.name")).toBe("SMART_DEFAULTS")
      expect(config.get("credentials.username")).toBe("")
    })

    it("returns the detectors' value provenance", async () => {
      const { detectedValues, config } = await resolver({
        detectors: [
          {
            name: "git",
            detect: () => ({
              config: { projectInfo: { scm: { url: "https://example.com/widgets.git" } } },
              detectedValues: [
                {
                  path: "projectInfo.scm.url",
                  value: "https://example.com/widgets.git",
                  origin: ".git/config",
                  confidence: "high",
                },
              ],
            }),
          },
        ],
      }).resolve({ project: project() })

      expect(detectedValues).toEqual({
        "projectInfo.scm.url": {
          path: "projectInfo.scm.url",
          value: "https://example.com/widgets.git",
          origin: ".git/config",
          confidence: "high",
        },
      })
      expect(config.explain("projectInfo.scm.url")).toBe("AUTO_DETECTED")
    })

    it("has no detected values without a project", async () => {
      const { detectedValues } = await resolver().resolve({})

      expect(detectedValues).toEqual({})
    })

    it("skips detectors when auto-detection is disabled", async () => {
      const detect = vi.fn(() => ({ config: { projectInfo: { url: "https://example.com" } } }))

      const { config } = await resolver({ detectors: [{ name: "git", detect }] }).resolve({
        project: project(),
        enableAutoDetection: false,
      })

      expect(detect).not.toHaveBeenCalled()
      expect(config.sourcesUsed()).toEqual(["SMART_DEFAULTS"])
    })

    it("honors explicit auto-detection toggles", async () => {
      const detect = vi.fn(() => ({ config: { projectInfo: { url: "https://example.com" } } }))

      await resolver({ detectors: [{ name: "git", category: "gitInfo", detect }] }).resolve({
        project: project(),
        explicit: defineConfig({ autoDetection: { gitInfo: false } }),
      })

      expect(detect).not.toHaveBeenCalled()
    })

    it("reports a failing detector as a warning", async () => {
      const { warnings, config } = await resolver({
        detectors: [
          {
            name: "git",
            detect: () => {
              throw new Error("not a git repository")
            },
          },
        ],
      }).resolve({ project: project() })

      expect(warnings).toEqual([
        {
          source: "AUTO_DETECTED",
          code: "detector_failed",
          key: "git",
          message: "Detector git failed: not a git repository",
        },
      ])
      expect(config.get("projectInfo.name")).toBe("widgets")
    })
  })

  describe("properties file", () => {
    it("counts a cache hit on the second unchanged resolution and reparses after a touch", async () => {
      await fs.writeFile(propertiesFile, "POM_NAME=widgets\n")
      const past = new Date(Date.now() - 60_000)
      await fs.utimes(propertiesFile, past, past)
      const r = resolver()

      await r.resolve({ propertiesFile })
      expect(fileCache.hits).toBe(0)

      await r.resolve({ propertiesFile })
      expect(fileCache.hits).toBe(1)

      await fs.writeFile(propertiesFile, "POM_NAME=gadgets\n")
      const future = new Date(Date.now() + 60_000)
      await fs.utimes(propertiesFile, future, future)

      const { config } = await r.resolve({ propertiesFile })

      expect(config.get("projectInfo.name")).toBe("gadgets")
      expect(fileCache.hits).toBe(1)
      expect(fileCache.misses).toBe(2)
    })

    it("parses a file once for concurrent resolutions", async () => {
      await fs.writeFile(propertiesFile, "POM_NAME=widgets\n")
      const r = resolver()

      const results = await Promise.all(
        Array.from({ length: 5 }, () => r.resolve({ propertiesFile })),
      )

      expect(fileCache.misses).toBe(1)
      expect(fileCache.hits).toBe(4)
      for (const { config } of results) {
        expect(config.get("projectInfo.name")).toBe("widgets")
      }
    })

    it("reports exactly one error for a malformed project URL", async () => {
      await fs.writeFile(propertiesFile, "POM_NAME=widgets\nPOM_URL=not-a-url\n")

      const { validationErrors } = await resolver().resolve({ propertiesFile })

      expect(validationErrors).toHaveLength(1)
      expect(validationErrors[0]).toMatchObject({
        field: "projectInfo.url",
        code: "invalid_url",
      })
    })

    it("keeps # inside values and decodes escapes end to end", async () => {
      await fs.writeFile(
        propertiesFile,
        [
          "SONATYPE_PASSWORD=test#secret",
          "POM_URL=https://example.com/widgets#readme",
          "signing.secretKeyRingFile=C:\\\\keys\\\\secring.gpg",
        ].join("\n"),
      )

      const { config } = await resolver().resolve({ propertiesFile })

      expect(config.get("credentials.password")).toBe("test#secret")
      expect(config.get("projectInfo.url")).toBe("https://example.com/widgets#readme")
      expect(config.get("signing.secretKeyRingFile")).toBe("C:\\keys\\secring.gpg")
    })

    it("treats a missing file as an absent source", async () => {
      const { config, warnings } = await resolver().resolve({
        propertiesFile: path.join(cwd, "missing.properties"),
      })

      expect(warnings).toEqual([])
      expect(config.sourcesUsed()).toEqual([])
    })

    it("surfaces malformed entries as warnings and keeps going", async () => {
      await fs.writeFile(propertiesFile, "POM_NAME=widgets\nautoPublish=sometimes\n")

      const { config, warnings } = await resolver().resolve({ propertiesFile })

      expect(config.get("projectInfo.name")).toBe("widgets")
      expect(config.get("publishing.autoPublish")).toBe(false)
      expect(warnings.map((w) => w.code)).toEqual(["malformed_entry"])
    })
  })

  describe("validation", () => {
    it("skips validation when asked", async () => {
      const { validationErrors } = await resolver().resolve({ validate: false })

      expect(validationErrors).toEqual([])
    })

    it("skips validation when the config disables it", async () => {
      const { validationErrors } = await resolver().resolve({
        explicit: defineConfig({ validation: { enabled: false } }),
      })

      expect(validationErrors).toEqual([])
    })

    it("reports a weak password as a warning that does not block", async () => {
      const { validationErrors } = await resolver({
        env: { SONATYPE_USERNAME: "env-user", SONATYPE_PASSWORD: "pw" },
      }).resolve({
        explicit: defineConfig({ projectInfo: { name: "widgets" } }),
        requireCredentials: true,
      })

      expect(validationErrors.map((e) => [e.code, e.severity])).toEqual([
        ["weak_password", "warning"],
      ])
      expect(() => assertValid(validationErrors)).not.toThrow()
    })

    it("requires credentials when the request asks for them", async () => {
      const { validationErrors } = await resolver().resolve({
        explicit: defineConfig({ projectInfo: { name: "widgets" } }),
        requireCredentials: true,
      })

      expect(validationErrors.map((e) => e.code)).toEqual(["missing_username", "missing_password"])
      expect(() => assertValid(validationErrors)).toThrow(ConfigurationValidationError)
    })
  })

  describe("logging", () => {
    it("logs warnings and a summary without secrets", async () => {
      const lines: Record<string, unknown>[] = []
      const destination = new Writable({
        write(chunk, _encoding, callback) {
          lines.push(JSON.parse(String(chunk)))
          callback()
        },
      })

      await fs.writeFile(propertiesFile, "SONATYPE_PASSWORD=test-secret\nautoPublish=maybe\n")

      await resolver({
        logger: new PinoLogger({ destination }, { level: "info" }),
      }).resolve({ propertiesFile })

      expect(lines.map((l) => l.msg)).toEqual([
        'Expected "true" or "false" for autoPublish, got "maybe"',
        "Resolved configuration",
      ])
      expect(lines[0]).toMatchObject({
        component: "config-resolver",
        source: "PROPERTIES",
        code: "malformed_entry",
        key: "autoPublish",
      })
      expect(JSON.stringify(lines)).not.toContain("test-secret")
    })
  })
})

describe("resolveConfiguration", () => {
  it("resolves with a fresh resolver", async () => {
    const { config } = await resolveConfiguration(
      { explicit: defineConfig({ projectInfo: { name: "widgets" } }) },
      { env: {}, fileCache: new PropertiesFileCache() },
    )

    expect(config.get("projectInfo.name")).toBe("widgets")
    expect(config.sourcesUsed()).toEqual(["DSL"])
  })
})
