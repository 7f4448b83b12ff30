import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

describe("isAppError", () => {
  describe("returns true", () => {
    it("for BaseError instance", () => {
      expect(isAppError(new BaseError("test", { code: "test" }))).toBe(true)
    })

    it("for subclass of BaseError", () => {
      class MissingPropertyError extends BaseError<"missing_property"> {
        constructor(message: string) {
          super(message, { code: "missing_property" })
        }
      }

      expect(isAppError(new MissingPropertyError("test"))).toBe(true)
    })

    it("for duck-typed object with all fields", () => {
      const duckTyped = {
        name: "ForeignError",
        message: "from elsewhere",
        code: "foreign",
        context: { source: "plugin" },
        isOperational: true,
        timestamp: new Date(),
      }

      expect(isAppError(duckTyped)).toBe(true)
    })
  })

  describe("returns false", () => {
    it.each([null, undefined, "error", 500])("for %s", (value) => {
      expect(isAppError(value)).toBe(false)
    })

    it("for standard Error", () => {
      expect(isAppError(new Error("standard"))).toBe(false)
    })

    it("for object with an invalid timestamp", () => {
      const obj = {
        name: "E",
        message: "m",
        code: "c",
        context: {},
        isOperational: true,
        timestamp: new Date("not a date"),
      }

      expect(isAppError(obj)).toBe(false)
    })

    it("for object missing context", () => {
      const obj = {
        name: "E",
        message: "m",
        code: "c",
        isOperational: true,
        timestamp: new Date(),
      }

      expect(isAppError(obj)).toBe(false)
    })
  })
})
