/**
 * @fileoverview Document extraction type definitions
 * @module lib/document-extraction/types
 */

export type DocumentFormat = 'docx' | 'pdf'

export interface ExtractedDocument {
  /** Whitespace-collapsed, NFC-normalized text */
  text: string
  /** Non-blank paragraphs (PDF: lines) in reading order, trimmed */
  paragraphs: string[]
  /** Number of pages (PDF only, 1 for DOCX) */
  pageCount: number
  format: DocumentFormat
}
