/**
 * @fileoverview DOCX text extraction
 * @module lib/document-extraction/docx-extractor
 */

import mammoth from 'mammoth'
import { CorruptDocumentError } from '@/lib/errors'
import type { ExtractedDocument } from './types'
import { normalizeWhitespace, toParagraphs } from './normalize'

/**
 * Extracts text from a DOCX buffer.
 *
 * mammoth.extractRawText() returns accepted changes (final text) with
 * paragraphs separated by blank lines.
 *
 * @throws CorruptDocumentError - Invalid or corrupt DOCX
 */
export async function extractDocx(buffer: Buffer): Promise<ExtractedDocument> {
  let raw: string
  try {
    const result = await mammoth.extractRawText({ buffer })
    raw = result.value
  } catch (error) {
    console.error('[Extract] mammoth failed', {
      error: error instanceof Error ? error.message : String(error),
    })
    throw new CorruptDocumentError(
      'Could not process this Word document. Try re-saving it or use a different format.'
    )
  }

  const paragraphs = toParagraphs(raw)
  return {
    text: normalizeWhitespace(paragraphs.join(' ')),
    paragraphs,
    pageCount: 1,
    format: 'docx',
  }
}
