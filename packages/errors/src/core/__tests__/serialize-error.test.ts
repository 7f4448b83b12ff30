import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("parse failed", {
        code: "document_parse_failed",
        context: { logicalName: "web-configuration.yaml" },
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "document_parse_failed",
        message: "parse failed",
        context: { logicalName: "web-configuration.yaml" },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("omits stack by default and includes it on request", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("serializes cause chain recursively", () => {
      const root = new Error("root cause")
      const middle = new BaseError("middle", { code: "mid", cause: root })
      const outer = new BaseError("outer", { code: "outer", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("mid")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("root cause")
    })

    it("omits cause property when undefined", () => {
      const err = new BaseError("no cause", { code: "test" })

      expect("cause" in serializeError(err)).toBe(false)
    })

    it("leaves out omitted context keys at every level", () => {
      const inner = new BaseError("inner", {
        code: "inner",
        context: { schema: { huge: true }, path: "db" },
      })
      const outer = new BaseError("outer", {
        code: "outer",
        context: { schema: { huge: true }, layer: "overrides" },
        cause: inner,
      })

      const serialized = serializeError(outer, { omitContext: ["schema"] })

      expect(serialized.context).toEqual({ layer: "overrides" })
      expect(serialized.cause?.context).toEqual({ path: "db" })
    })
  })

  describe("standard Error instances", () => {
    it("uses code unknown and marks as non-operational", () => {
      const serialized = serializeError(new TypeError("bad"))

      expect(serialized).toEqual({
        name: "TypeError",
        code: "unknown",
        message: "bad",
        context: {},
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })

  describe("non-Error values", () => {
    it("uses a thrown string as the message", () => {
      const serialized = serializeError("boom")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("boom")
      expect(serialized.context).toEqual({})
    })

    it("keeps other values in context", () => {
      const serialized = serializeError({ reason: 42 })

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value: { reason: 42 } })
    })
  })
})
