import { z } from 'zod'
import type { CandidateDocument } from '@/lib/scraping'

// ============================================================================
// Classification
// ============================================================================

/**
 * Outcome of snapping the model's free-text answer onto the mapping table
 * vocabulary. `unmatched` keeps the raw answer so callers can still report it.
 */
export type ClassificationResult =
  | { kind: 'matched'; label: string; rawLabel: string; similarity: number }
  | { kind: 'unmatched'; rawLabel: string }

/** The document type to report: the matched label, else the raw answer */
export function documentTypeOf(result: ClassificationResult): string {
  return result.kind === 'matched' ? result.label : result.rawLabel
}

// ============================================================================
// Checklist Lookup
// ============================================================================

export interface ChecklistDocument extends CandidateDocument {
  summary: string
}

/** Why a crawled candidate did not make it into the checklist */
export type RejectionReason = 'excluded' | 'unparseable' | 'request_failed'

export interface RejectedCandidate extends CandidateDocument {
  reason: RejectionReason
  detail?: string
}

export interface ChecklistLookup {
  identifiedDocumentType: string
  /** Mapping table value for the type; null when the type is not mapped */
  officialUrl: string | null
  checklistDocuments: ChecklistDocument[]
  rejectedCandidates: RejectedCandidate[]
}

export const DIRECT_DOCUMENT_SUMMARY = 'Direct official document (no scraping needed).'

// ============================================================================
// Model Response Schemas
// ============================================================================

export const checklistDecisionSchema = z.object({
  decision: z.enum(['include', 'exclude']),
  summary: z.string().nullish(),
})

export const missingItemsSchema = z.object({
  summary: z.string().describe('One or two sentences on overall checklist coverage'),
  missingItems: z
    .array(z.string())
    .describe('Each required checklist item absent from the uploaded document'),
})

export type MissingItemsResult = z.infer<typeof missingItemsSchema>

/** Absent fields read as empty strings */
const reportField = z
  .string()
  .nullish()
  .transform((value) => value ?? '')

export const redFlagSchema = z.object({
  issue: reportField,
  law_reference: reportField,
  snippet: reportField,
})

export const redFlagReportSchema = z.object({
  summary: reportField,
  red_flags: z.array(redFlagSchema).default([]),
})
