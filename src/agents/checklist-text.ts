/**
 * @fileoverview Checklist text loader
 *
 * Reads the text of the located checklist documents so the missing-item
 * comparator has something to compare against. Each source is read
 * independently; one that cannot be read is skipped with a warning.
 *
 * @module agents/checklist-text
 */

import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { extractText, extractTextFromBuffer } from '@/lib/document-extraction'
import { tryCatch } from '@/lib/result'
import { fetchBinary as defaultFetchBinary, withoutQuery, type BinaryFetcher } from '@/lib/scraping'
import { isLocalPath } from '@/pipeline/mapping-table'
import type { ChecklistLookup } from './types'

/** Checklist documents read per review */
export const MAX_CHECKLIST_DOCUMENTS = 3

const READABLE_EXTENSIONS = new Set(['.pdf', '.docx'])

export interface LoadChecklistTextOptions {
  fetchBinary?: BinaryFetcher
  maxDocuments?: number
}

/** Text of one source, or null when its format is not readable */
async function readSource(source: string, fetchBinary: BinaryFetcher): Promise<string | null> {
  const extension = extname(withoutQuery(source)).toLowerCase()

  if (isLocalPath(source)) {
    if (extension === '.txt') {
      return (await readFile(source, 'utf8')).trim()
    }
    return READABLE_EXTENSIONS.has(extension) ? (await extractText(source)).text : null
  }

  if (!READABLE_EXTENSIONS.has(extension)) {
    return null
  }
  return (await extractTextFromBuffer(await fetchBinary(source), extension)).text
}

/**
 * Concatenated text of up to `maxDocuments` checklist documents, separated by
 * blank lines. Empty when nothing could be read.
 */
export async function loadChecklistText(
  lookup: Pick<ChecklistLookup, 'checklistDocuments'>,
  options: LoadChecklistTextOptions = {}
): Promise<string> {
  const { fetchBinary = defaultFetchBinary, maxDocuments = MAX_CHECKLIST_DOCUMENTS } = options
  const texts: string[] = []

  for (const document of lookup.checklistDocuments.slice(0, maxDocuments)) {
    const source = document.url
    const result = await tryCatch(() => readSource(source, fetchBinary))

    if (!result.ok) {
      console.warn('[ChecklistText] Skipping unreadable checklist source', {
        source,
        error: result.error.message,
      })
      continue
    }
    if (result.value === null) {
      console.warn('[ChecklistText] Skipping unsupported checklist format', { source })
      continue
    }
    if (result.value.length > 0) {
      texts.push(result.value)
    }
  }

  return texts.join('\n\n')
}
