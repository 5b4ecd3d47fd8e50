import { BaseError, serializeError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("carries message and code", () => {
      const err = new BaseError("properties file unreadable", { code: "unreadable_source" })

      expect(err.message).toBe("properties file unreadable")
      expect(err.code).toBe("unreadable_source")
    })

    it("uses the subclass name", () => {
      class ConfigError extends BaseError<"config_error"> {}

      const err = new ConfigError("bad", { code: "config_error" })

      expect(err.name).toBe("ConfigError")
      expect(err).toBeInstanceOf(BaseError)
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isOperational).toBe(true)
    })

    it("stamps the current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("copies context so later mutation of the input has no effect", () => {
      const context: Record<string, unknown> = { file: "gradle.properties" }
      const err = new BaseError("test", { code: "test", context })

      context.file = "other.properties"

      expect(err.context).toEqual({ file: "gradle.properties" })
    })

    it("keeps the cause", () => {
      const cause = new Error("EACCES")
      const err = new BaseError("test", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })
  })

  describe("serializeError", () => {
    it("serializes a BaseError with its nested cause", () => {
      const err = new BaseError("wrapped", {
        code: "outer",
        context: { path: "credentials.username" },
        cause: new Error("inner"),
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "outer",
        message: "wrapped",
        context: { path: "credentials.username" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
        cause: {
          name: "Error",
          code: "unknown",
          message: "inner",
          context: {},
          isOperational: false,
          timestamp: "2024-01-15T10:30:00.000Z",
        },
      })
    })

    it("omits the stack unless asked for", () => {
      const err = new BaseError("test", { code: "test" })

      expect(serializeError(err)).not.toHaveProperty("stack")
      expect(serializeError(err, { includeStack: true }).stack).toBe(err.stack)
    })

    it("wraps non-Error values", () => {
      expect(serializeError(42)).toEqual({
        name: "NonErrorThrown",
        code: "unknown",
        message: "Unknown error",
        context: { value: 42 },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is what toJSON returns", () => {
      const err = new BaseError("test", { code: "test" })

      expect(JSON.parse(JSON.stringify(err))).toEqual(serializeError(err))
    })
  })
})
