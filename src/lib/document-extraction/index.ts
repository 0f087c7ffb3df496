/**
 * @fileoverview Document extraction barrel export
 * @module lib/document-extraction
 */

export { extractText, extractTextFromBuffer, detectFormat } from './extract-document'
export { extractDocx } from './docx-extractor'
export { extractPdf } from './pdf-extractor'
export { normalizeWhitespace, toParagraphs } from './normalize'
export type { DocumentFormat, ExtractedDocument } from './types'
