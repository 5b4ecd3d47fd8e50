import { Diagnostics } from "../diagnostics"

describe("Diagnostics", () => {
  let diagnostics: Diagnostics

  beforeEach(() => {
    diagnostics = new Diagnostics()
    diagnostics.recordPartial({ projectInfo: { name: "detected" } }, "AUTO_DETECTED")
    diagnostics.recordPartial(
      { projectInfo: { name: "fallback" }, publishing: { dryRun: false } },
      "SMART_DEFAULTS",
    )
    diagnostics.recordPartial(
      { credentials: { username: "env-user", password: "test-secret" } },
      "ENVIRONMENT",
    )
    diagnostics.recordPartial({ credentials: { username: "dsl-user" } }, "DSL")
  })

  it("keeps values in arrival order", () => {
    expect(diagnostics.valuesFor("projectInfo.name")).toEqual([
      { value: "detected", source: "AUTO_DETECTED" },
      { value: "fallback", source: "SMART_DEFAULTS" },
    ])
  })

  it("picks the highest-precedence value as final", () => {
    expect(diagnostics.finalValue("projectInfo.name")).toBe("detected")
    expect(diagnostics.finalValue("credentials.username")).toBe("dsl-user")
    expect(diagnostics.finalValue("credentials.password")).toBe("test-secret")
  })

  it("falls back to the type default for untouched fields", () => {
    expect(diagnostics.finalValue("publishing.aggregation")).toBe(true)
    expect(diagnostics.finalValue("projectInfo.developers")).toEqual([])
    expect(diagnostics.explain("publishing.aggregation")).toBe("DEFAULTS")
  })

  it("explains the winning source", () => {
    expect(diagnostics.explain("credentials.username")).toBe("DSL")
    expect(diagnostics.explain("publishing.dryRun")).toBe("SMART_DEFAULTS")
  })

  it("lists contributing sources in precedence order", () => {
    expect(diagnostics.sourcesUsed()).toEqual([
      "SMART_DEFAULTS",
      "AUTO_DETECTED",
      "ENVIRONMENT",
      "DSL",
    ])
  })

  it("does not count a source that set nothing", () => {
    const count = diagnostics.recordPartial({ projectInfo: { name: "  " } }, "PROPERTIES")

    expect(count).toBe(0)
    expect(diagnostics.sourcesUsed()).not.toContain("PROPERTIES")
  })

  it("lists touched paths in field order", () => {
    expect(diagnostics.paths()).toEqual([
      "credentials.username",
      "credentials.password",
      "projectInfo.name",
      "publishing.dryRun",
    ])
  })

  it("reports provenance with secrets masked", () => {
    expect(diagnostics.report()).toEqual([
      {
        path: "credentials.username",
        value: "dsl-user",
        source: "DSL",
        overridden: ["ENVIRONMENT"],
      },
      {
        path: "credentials.password",
        value: "********",
        source: "ENVIRONMENT",
        overridden: [],
      },
      {
        path: "projectInfo.name",
        value: "detected",
        source: "AUTO_DETECTED",
        overridden: ["SMART_DEFAULTS"],
      },
      {
        path: "publishing.dryRun",
        value: "false",
        source: "SMART_DEFAULTS",
        overridden: [],
      },
    ])
  })

  it("records single values and sources directly", () => {
    const fresh = new Diagnostics()

    fresh.recordValue("signing.keyId", "ABCD1234", "ENVIRONMENT")
    fresh.recordSource("ENVIRONMENT")

    expect(fresh.finalValue("signing.keyId")).toBe("ABCD1234")
    expect(fresh.sourcesUsed()).toEqual(["ENVIRONMENT"])
  })
})
