import { defineConfig } from "../../../core/model/define"
import { DslLoader } from "../dsl-loader"

describe("DslLoader behavior", () => {
  it("passes the explicit partial through unchanged", async () => {
    const explicit = defineConfig({ projectInfo: { name: "widgets" } })

    const result = await new DslLoader().load(explicit)

    expect(result.partial).toBe(explicit)
  })
})
