import { applyMappings, parseBoolean } from "../mapping"

describe("parseBoolean", () => {
  it("accepts true and false in any case", () => {
    expect(parseBoolean("true")).toBe(true)
    expect(parseBoolean("FALSE")).toBe(false)
    expect(parseBoolean(" True ")).toBe(true)
  })

  it("rejects anything else", () => {
    expect(parseBoolean("1")).toBeUndefined()
    expect(parseBoolean("yes")).toBeUndefined()
  })
})

describe("applyMappings", () => {
  it("dispatches string, boolean and developer targets", () => {
    const { partial, warnings } = applyMappings(
      { NAME: "widgets", AUTO: "true", DEV_EMAIL: "jdoe@example.com" },
      [
        { key: "NAME", target: "projectInfo.name" },
        { key: "AUTO", target: "publishing.autoPublish" },
        { key: "DEV_EMAIL", target: "projectInfo.developer.email" },
      ],
      "PROPERTIES",
    )

    expect(warnings).toEqual([])
    expect(partial).toEqual({
      projectInfo: {
        name: "widgets",
        developers: [
          { id: "", name: "", email: "jdoe@example.com", organization: "", organizationUrl: "" },
        ],
      },
      publishing: { autoPublish: true },
    })
  })

  it("trims values", () => {
    const { partial } = applyMappings(
      { NAME: "  widgets  " },
      [{ key: "NAME", target: "projectInfo.name" }],
      "ENVIRONMENT",
    )

    expect(partial).toEqual({ projectInfo: { name: "widgets" } })
  })

  it("tags malformed entries with the loading source", () => {
    const { partial, warnings } = applyMappings(
      { DRY: "maybe" },
      [{ key: "DRY", target: "publishing.dryRun" }],
      "ENVIRONMENT",
    )

    expect(partial).toEqual({})
    expect(warnings).toEqual([
      {
        source: "ENVIRONMENT",
        code: "malformed_entry",
        key: "DRY",
        message: 'Expected "true" or "false" for DRY, got "maybe"',
      },
    ])
  })
})
