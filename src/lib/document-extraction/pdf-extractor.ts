/**
 * @fileoverview PDF text extraction with error handling
 *
 * Uses unpdf (serverless-optimized PDF.js build), loaded lazily so DOCX-only
 * runs never pay for PDF.js startup.
 *
 * @module lib/document-extraction/pdf-extractor
 */

import { EncryptedDocumentError, CorruptDocumentError } from '@/lib/errors'
import type { ExtractedDocument } from './types'
import { normalizeWhitespace, toParagraphs } from './normalize'

/**
 * Extracts text from a PDF buffer page by page.
 *
 * @throws EncryptedDocumentError - Password-protected PDF
 * @throws CorruptDocumentError - Invalid or corrupt PDF
 */
export async function extractPdf(buffer: Buffer): Promise<ExtractedDocument> {
  const { extractText, getDocumentProxy } = await import('unpdf')

  try {
    const pdf = await getDocumentProxy(new Uint8Array(buffer))
    const { totalPages, text: pages } = await extractText(pdf, { mergePages: false })
    await pdf.destroy()

    const paragraphs = pages.flatMap((page) => toParagraphs(page))
    return {
      text: normalizeWhitespace(paragraphs.join(' ')),
      paragraphs,
      pageCount: totalPages,
      format: 'pdf',
    }
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error)

    if (errorMessage.includes('password') || errorMessage.includes('encrypted')) {
      throw new EncryptedDocumentError()
    }
    if (errorMessage.includes('Invalid PDF') || errorMessage.includes('not a PDF')) {
      throw new CorruptDocumentError()
    }
    // Re-throw unknown errors
    throw error
  }
}
