// src/lib/result.test.ts
import { describe, it, expect } from "vitest"
import { Ok, Err, tryCatch } from "./result"

describe("Result Type", () => {
  describe("Ok", () => {
    it("creates a success result", () => {
      const result = Ok(42)
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value).toBe(42)
      }
    })
  })

  describe("Err", () => {
    it("creates a failure result", () => {
      const result = Err(new Error("failed"))
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe("failed")
      }
    })
  })

  describe("tryCatch", () => {
    it("wraps resolved values", async () => {
      const result = await tryCatch(async () => "ok")
      expect(result).toEqual({ ok: true, value: "ok" })
    })

    it("captures thrown errors", async () => {
      const result = await tryCatch(async () => {
        throw new Error("network down")
      })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe("network down")
      }
    })

    it("wraps non-Error throws in Error", async () => {
      const result = await tryCatch(async () => {
        throw "plain string"
      })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(Error)
        expect(result.error.message).toBe("plain string")
      }
    })
  })
})
