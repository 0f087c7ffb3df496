/**
 * @fileoverview Unified document extraction entry point
 *
 * Dispatches on file extension. Only DOCX and PDF are readable; anything else
 * fails before the file is touched.
 *
 * @module lib/document-extraction/extract-document
 */

import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { NotFoundError, UnsupportedFileTypeError } from '@/lib/errors'
import { extractDocx } from './docx-extractor'
import { extractPdf } from './pdf-extractor'
import type { DocumentFormat, ExtractedDocument } from './types'

const FORMAT_BY_EXTENSION: Record<string, DocumentFormat> = {
  '.docx': 'docx',
  '.pdf': 'pdf',
}

/**
 * Resolve the reader for an extension (case-insensitive, leading dot optional).
 *
 * @throws UnsupportedFileTypeError
 */
export function detectFormat(extension: string): DocumentFormat {
  const normalized = extension.toLowerCase()
  const key = normalized.startsWith('.') ? normalized : `.${normalized}`
  const format = FORMAT_BY_EXTENSION[key]
  if (!format) {
    throw new UnsupportedFileTypeError(normalized)
  }
  return format
}

/**
 * Extract text from an in-memory document.
 */
export async function extractTextFromBuffer(
  buffer: Buffer,
  extension: string
): Promise<ExtractedDocument> {
  const format = detectFormat(extension)
  return format === 'docx' ? extractDocx(buffer) : extractPdf(buffer)
}

/**
 * Extract text from a document on disk.
 *
 * @throws UnsupportedFileTypeError - extension is not .docx or .pdf
 * @throws NotFoundError - file does not exist
 */
export async function extractText(filePath: string): Promise<ExtractedDocument> {
  const extension = extname(filePath)
  detectFormat(extension)

  let buffer: Buffer
  try {
    buffer = await readFile(filePath)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new NotFoundError(`Document not found: ${filePath}`)
    }
    throw error
  }

  return extractTextFromBuffer(buffer, extension)
}
