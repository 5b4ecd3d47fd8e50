import { compareSources, ConfigurationSource, precedenceOf, SOURCE_PRECEDENCE } from "../source"

describe("configuration sources", () => {
  it("ranks explicit configuration highest and defaults lowest", () => {
    expect(precedenceOf("DSL")).toBe(SOURCE_PRECEDENCE.length - 1)
    expect(precedenceOf("DEFAULTS")).toBe(0)
  })

  it("lists every source exactly once", () => {
    expect([...SOURCE_PRECEDENCE].sort()).toEqual(Object.values(ConfigurationSource).sort())
  })

  it("sorts sources in ascending precedence", () => {
    const sources: ConfigurationSource[] = [
      "DSL",
      "ENVIRONMENT",
      "SMART_DEFAULTS",
      "PROPERTIES",
      "AUTO_DETECTED",
    ]

    expect(sources.sort(compareSources)).toEqual([
      "SMART_DEFAULTS",
      "AUTO_DETECTED",
      "ENVIRONMENT",
      "PROPERTIES",
      "DSL",
    ])
  })

  it("puts properties above the environment", () => {
    expect(compareSources("PROPERTIES", "ENVIRONMENT")).toBeGreaterThan(0)
    expect(compareSources("AUTO_DETECTED", "SMART_DEFAULTS")).toBeGreaterThan(0)
    expect(compareSources("DSL", "DSL")).toBe(0)
  })
})
