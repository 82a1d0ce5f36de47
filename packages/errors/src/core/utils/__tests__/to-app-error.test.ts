import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("returns an AppError unchanged", () => {
    const err = new BaseError("x", { code: "not_found", context: { profile: "p1" } })

    expect(toAppError(err)).toBe(err)
  })

  describe("standard Error input", () => {
    it("wraps it and keeps it as the cause", () => {
      const err = new Error("EISDIR")
      const result = toAppError(err)

      expect(result).toBeInstanceOf(BaseError)
      expect(result.message).toBe("EISDIR")
      expect(result.cause).toBe(err)
      expect(result.isOperational).toBe(false)
    })

    it("uses the fallback code", () => {
      expect(toAppError(new Error("x")).code).toBe("unknown")
      expect(toAppError(new Error("x"), "io_error").code).toBe("io_error")
    })
  })

  describe("other values", () => {
    it("uses a string as the message with an empty context", () => {
      const result = toAppError("boom")

      expect(result.message).toBe("boom")
      expect(result.context).toEqual({})
    })

    it("keeps anything else under context.value", () => {
      const result = toAppError({ some: "object" })

      expect(result.message).toBe("Unknown error")
      expect(result.context).toEqual({ value: { some: "object" } })
      expect(result.isOperational).toBe(false)
    })
  })
})
