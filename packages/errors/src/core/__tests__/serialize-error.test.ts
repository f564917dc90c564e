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
      const err = new BaseError("bad header", {
        code: "test",
        context: { position: 12 },
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "test",
        message: "bad header",
        context: { position: 12 },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("omits stack unless requested", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("omits stack when it is empty", () => {
      const err = new BaseError("test", { code: "test" })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes the cause chain recursively", () => {
      const root = new Error("socket closed")
      const middle = new BaseError("middle", { code: "mid", cause: root })
      const outer = new BaseError("outer", { code: "outer", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("mid")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("socket closed")
    })

    it("omits cause when undefined", () => {
      const err = new BaseError("no cause", { code: "test" })

      expect("cause" in serializeError(err)).toBe(false)
    })
  })

  describe("standard Error instances", () => {
    it("uses code unknown and marks them non-operational", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized.code).toBe("unknown")
      expect(serialized.name).toBe("TypeError")
      expect(serialized.isOperational).toBe(false)
      expect(serialized.context).toEqual({})
    })

    it("handles Error with cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("wraps a string as the message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.message).toBe("something went wrong")
      expect(serialized.name).toBe("NonErrorThrown")
    })

    it("wraps other values in context.value", () => {
      const value = { opcode: 7 }

      const serialized = serializeError(value)

      expect(serialized.context).toEqual({ value })
      expect(serialized.message).toBe("Unknown error")
      expect(serialized.isOperational).toBe(false)
    })

    it("handles null", () => {
      expect(serializeError(null).context).toEqual({ value: null })
    })
  })
})
