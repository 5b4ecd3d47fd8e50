import { isLogLevelName, logLevelNames, LogLevels } from "../log-level"

describe("log levels", () => {
  it("orders names from least to most severe", () => {
    expect(logLevelNames).toEqual(["trace", "debug", "info", "warn", "error", "fatal"])
    expect(LogLevels.Warn).toBeGreaterThan(LogLevels.Info)
  })

  it("recognizes level names", () => {
    expect(isLogLevelName("debug")).toBe(true)
    expect(isLogLevelName("verbose")).toBe(false)
  })
})
