import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

const { extractText } = vi.hoisted(() => ({ extractText: vi.fn() }))

vi.mock("@/lib/document-extraction", () => ({ extractText }))

import { annotateDocument, buildAnnotatedDocx, planAnnotations } from "./annotate-document"
import type { RedFlag } from "./types"

const PARAGRAPHS = [
  "RESOLUTION OF THE BOARD",
  "The Company shall be governed by the laws of the Emirate of Dubai.",
  "Signed:   ____________",
]

function flag(snippet: string, issue = "issue"): RedFlag {
  return { snippet, issue, law_reference: "Rule 1" }
}

describe("planAnnotations", () => {
  it("anchors each finding on the first paragraph containing its snippet", () => {
    const plan = planAnnotations(PARAGRAPHS, [
      flag("laws of the   EMIRATE of Dubai"),
      flag("“Signed: ____________”"),
      flag("the"),
    ])

    expect([...plan.anchored.entries()]).toEqual([
      [1, [0]],
      [2, [1]],
      [0, [2]],
    ])
    expect(plan.unlocated).toEqual([])
  })

  it("groups several findings on one paragraph in finding order", () => {
    const plan = planAnnotations(PARAGRAPHS, [flag("Dubai"), flag("governed by")])
    expect(plan.anchored.get(1)).toEqual([0, 1])
  })

  it("marks empty or unmatched snippets as unlocated", () => {
    const plan = planAnnotations(PARAGRAPHS, [flag(""), flag("Abu Dhabi Global Market"), flag("...")])
    expect(plan.anchored.size).toBe(0)
    expect(plan.unlocated).toEqual([0, 1, 2])
  })
})

describe("buildAnnotatedDocx", () => {
  it("produces a DOCX (zip) package", async () => {
    const buffer = await buildAnnotatedDocx(PARAGRAPHS, [flag("Dubai"), flag("not present")])
    expect(buffer.subarray(0, 2).toString("latin1")).toBe("PK")
  })

  it("handles a document without findings", async () => {
    const buffer = await buildAnnotatedDocx(PARAGRAPHS, [])
    expect(buffer.length).toBeGreaterThan(0)
  })
})

describe("annotateDocument", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "annotate-"))
    extractText.mockResolvedValue({
      text: PARAGRAPHS.join(" "),
      paragraphs: PARAGRAPHS,
      pageCount: 1,
      format: "docx",
    })
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("reads the source and findings and writes the annotated copy", async () => {
    const findingsPath = join(dir, "findings.tsv")
    await writeFile(findingsPath, "Emirate of Dubai\tWrong jurisdiction\tArt. 6\n", "utf-8")
    const outputPath = join(dir, "out", "annotated.docx")

    const written = await annotateDocument({
      sourcePath: join(dir, "upload.docx"),
      findingsPath,
      outputPath,
    })

    expect(written).toBe(outputPath)
    expect(extractText).toHaveBeenCalledWith(join(dir, "upload.docx"))
    const bytes = await readFile(outputPath)
    expect(bytes.subarray(0, 2).toString("latin1")).toBe("PK")
  })
})
