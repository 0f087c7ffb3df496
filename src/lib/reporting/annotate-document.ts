/**
 * @fileoverview Annotated DOCX writer
 *
 * Rebuilds the reviewed document's paragraphs as a new DOCX and attaches one
 * Word comment per finding. A finding is anchored on the first paragraph that
 * contains its snippet (case and whitespace ignored); findings that match no
 * paragraph are collected under a trailing "Unlocated findings" heading.
 *
 * @module lib/reporting/annotate-document
 */

import { mkdir, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import {
  CommentRangeEnd,
  CommentRangeStart,
  CommentReference,
  Document,
  HeadingLevel,
  Packer,
  Paragraph,
  TextRun,
} from "docx"
import { extractText } from "@/lib/document-extraction"
import { readFindingsTsv } from "./red-flag-report"
import type { RedFlag } from "./types"

export const COMMENT_AUTHOR = "Compliance Review"
export const UNLOCATED_HEADING = "Unlocated findings"

export interface AnnotationPlan {
  /** Paragraph index -> indexes of findings anchored there */
  anchored: Map<number, number[]>
  /** Findings whose snippet matched no paragraph */
  unlocated: number[]
}

function normalizeForMatch(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/^["'“”‘’.…\s]+|["'“”‘’.…\s]+$/g, "")
}

export function planAnnotations(paragraphs: string[], findings: RedFlag[]): AnnotationPlan {
  const normalizedParagraphs = paragraphs.map(normalizeForMatch)
  const anchored = new Map<number, number[]>()
  const unlocated: number[] = []

  findings.forEach((finding, findingIndex) => {
    const needle = normalizeForMatch(finding.snippet)
    const paragraphIndex = needle
      ? normalizedParagraphs.findIndex((paragraph) => paragraph.includes(needle))
      : -1

    if (paragraphIndex === -1) {
      unlocated.push(findingIndex)
      return
    }
    anchored.set(paragraphIndex, [...(anchored.get(paragraphIndex) ?? []), findingIndex])
  })

  return { anchored, unlocated }
}

function commentedParagraph(text: string, commentIds: number[]): Paragraph {
  return new Paragraph({
    children: [
      ...commentIds.map((id) => new CommentRangeStart(id)),
      new TextRun(text),
      ...commentIds.map((id) => new CommentRangeEnd(id)),
      ...commentIds.map((id) => new TextRun({ children: [new CommentReference(id)] })),
    ],
  })
}

function commentBody(finding: RedFlag): Paragraph[] {
  const body = [new Paragraph({ children: [new TextRun({ text: finding.issue, bold: true })] })]
  if (finding.law_reference) {
    body.push(new Paragraph({ children: [new TextRun(`Reference: ${finding.law_reference}`)] }))
  }
  return body
}

/**
 * Build the annotated document in memory.
 */
export async function buildAnnotatedDocx(
  paragraphs: string[],
  findings: RedFlag[],
  author = COMMENT_AUTHOR
): Promise<Buffer> {
  const plan = planAnnotations(paragraphs, findings)
  const date = new Date()

  const body = paragraphs.map((text, index) =>
    commentedParagraph(text, plan.anchored.get(index) ?? [])
  )

  if (plan.unlocated.length > 0) {
    body.push(new Paragraph({ text: UNLOCATED_HEADING, heading: HeadingLevel.HEADING_2 }))
    for (const id of plan.unlocated) {
      body.push(commentedParagraph(findings[id].snippet || findings[id].issue, [id]))
    }
  }

  const doc = new Document({
    comments: {
      children: findings.map((finding, id) => ({
        id,
        author,
        date,
        children: commentBody(finding),
      })),
    },
    sections: [{ children: body }],
  })

  return Packer.toBuffer(doc)
}

export interface AnnotateDocumentInput {
  /** Reviewed document (.docx or .pdf) */
  sourcePath: string
  /** Findings TSV written by writeRedFlagReports */
  findingsPath: string
  outputPath: string
}

/**
 * Write an annotated DOCX copy of `sourcePath` to `outputPath`.
 */
export async function annotateDocument(input: AnnotateDocumentInput): Promise<string> {
  const [document, findings] = await Promise.all([
    extractText(input.sourcePath),
    readFindingsTsv(input.findingsPath),
  ])

  const buffer = await buildAnnotatedDocx(document.paragraphs, findings)
  await mkdir(dirname(input.outputPath), { recursive: true })
  await writeFile(input.outputPath, buffer)

  return input.outputPath
}
