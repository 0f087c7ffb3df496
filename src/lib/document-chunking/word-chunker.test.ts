import { describe, it, expect } from "vitest"
import { chunkWords } from "./word-chunker"
import { ValidationError } from "@/lib/errors"

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(" ")
}

describe("chunkWords", () => {
  it("returns no chunks for blank text", () => {
    expect(chunkWords("   \n\t ")).toEqual([])
  })

  it("keeps short text in a single chunk", () => {
    expect(chunkWords("Rule 1.\n\nA  company  must file", { size: 10, overlap: 2 })).toEqual([
      { index: 0, startWord: 0, wordCount: 6, text: "Rule 1. A company must file" },
    ])
  })

  it("steps by size minus overlap", () => {
    const chunks = chunkWords(words(10), { size: 4, overlap: 1 })

    expect(chunks.map((c) => c.startWord)).toEqual([0, 3, 6, 9])
    expect(chunks.map((c) => c.text)).toEqual([
      "w0 w1 w2 w3",
      "w3 w4 w5 w6",
      "w6 w7 w8 w9",
      "w9",
    ])
  })

  it("uses 500-word windows with a 50-word overlap by default", () => {
    const chunks = chunkWords(words(1000))

    expect(chunks.map((c) => [c.startWord, c.wordCount])).toEqual([
      [0, 500],
      [450, 500],
      [900, 100],
    ])
    expect(chunks[1].text.startsWith("w450 ")).toBe(true)
    expect(chunks[0].text.endsWith(" w499")).toBe(true)
  })

  it("is deterministic for identical input", () => {
    const text = words(1234)
    expect(chunkWords(text, { size: 100, overlap: 10 })).toEqual(
      chunkWords(text, { size: 100, overlap: 10 })
    )
  })

  it("rejects overlap not smaller than size", () => {
    expect(() => chunkWords("a b", { size: 5, overlap: 5 })).toThrow(ValidationError)
    expect(() => chunkWords("a b", { size: 5, overlap: 6 })).toThrow("Invalid chunk overlap")
  })

  it("rejects non-positive sizes", () => {
    expect(() => chunkWords("a b", { size: 0, overlap: 0 })).toThrow("Invalid chunk size")
  })
})
