/**
 * @fileoverview Checklist locator
 *
 * Turns a classification into the set of official checklist documents:
 *
 * - unmapped type: nothing to check against
 * - local file or direct document URL: that one document, no scraping
 * - anything else is a site root: crawl (or scrape one page) for document
 *   links, then let the checklist filter pick the useful ones
 *
 * @module agents/checklist-locator
 */

import type { LanguageModel } from 'ai'
import type { BudgetTracker } from '@/lib/ai/budget'
import {
  basenameOf,
  crawlDocumentLinks,
  DEFAULT_CRAWL_DEPTH,
  hasDocumentExtension,
  scrapeDocumentLinks,
  withoutQuery,
  type HtmlFetcher,
} from '@/lib/scraping'
import { isLocalPath, mappingValueFor, type MappingTable } from '@/pipeline/mapping-table'
import { runChecklistFilterAgent } from './checklist-filter'
import { DIRECT_DOCUMENT_SUMMARY, documentTypeOf, type ChecklistLookup, type ClassificationResult } from './types'

export interface LocateChecklistInput {
  classification: ClassificationResult
  mappingTable: MappingTable
  documentText: string
  /** Checklist filter model */
  model: LanguageModel
  /** Crawl linked pages (true) or read only the mapped page (false) */
  deepScrape?: boolean
  crawlDepth?: number
  fetchHtml?: HtmlFetcher
  budgetTracker?: BudgetTracker
}

/** True when the mapping value is itself the checklist document */
export function isDirectDocument(value: string): boolean {
  return isLocalPath(value) || hasDocumentExtension(withoutQuery(value))
}

export async function locateChecklist(input: LocateChecklistInput): Promise<ChecklistLookup> {
  const {
    classification,
    mappingTable,
    documentText,
    model,
    deepScrape = true,
    crawlDepth = DEFAULT_CRAWL_DEPTH,
    fetchHtml,
    budgetTracker,
  } = input

  const identifiedDocumentType = documentTypeOf(classification)
  const officialUrl =
    classification.kind === 'matched'
      ? mappingValueFor(mappingTable, classification.label)
      : undefined

  if (officialUrl === undefined) {
    return { identifiedDocumentType, officialUrl: null, checklistDocuments: [], rejectedCandidates: [] }
  }

  if (isDirectDocument(officialUrl)) {
    return {
      identifiedDocumentType,
      officialUrl,
      checklistDocuments: [
        { title: basenameOf(officialUrl), url: officialUrl, summary: DIRECT_DOCUMENT_SUMMARY },
      ],
      rejectedCandidates: [],
    }
  }

  const candidates = deepScrape
    ? await crawlDocumentLinks(officialUrl, { maxDepth: crawlDepth, fetchHtml })
    : await scrapeDocumentLinks(officialUrl, { fetchHtml })

  const { documents, rejected } = await runChecklistFilterAgent({
    candidates,
    documentText,
    model,
    budgetTracker,
  })

  return {
    identifiedDocumentType,
    officialUrl,
    checklistDocuments: documents,
    rejectedCandidates: rejected,
  }
}
