import { describe, it, expect, vi, beforeAll, beforeEach, afterAll } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

const { extractRawText, extractPdfText, getDocumentProxy, destroy } = vi.hoisted(() => ({
  extractRawText: vi.fn(),
  extractPdfText: vi.fn(),
  getDocumentProxy: vi.fn(),
  destroy: vi.fn(),
}))

vi.mock('mammoth', () => ({
  default: { extractRawText },
}))

vi.mock('unpdf', () => ({
  extractText: extractPdfText,
  getDocumentProxy,
}))

import { detectFormat, extractText, extractTextFromBuffer } from './extract-document'
import {
  CorruptDocumentError,
  EncryptedDocumentError,
  NotFoundError,
  UnsupportedFileTypeError,
} from '@/lib/errors'

describe('document extraction', () => {
  let dir: string

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'extract-'))
  })

  beforeEach(() => {
    vi.clearAllMocks()
    getDocumentProxy.mockResolvedValue({ destroy })
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('detectFormat', () => {
    it('accepts docx and pdf case-insensitively', () => {
      expect(detectFormat('.DOCX')).toBe('docx')
      expect(detectFormat('pdf')).toBe('pdf')
    })

    it('rejects other extensions', () => {
      expect(() => detectFormat('.doc')).toThrow(UnsupportedFileTypeError)
      expect(() => detectFormat('')).toThrow('Unsupported file type: (none)')
    })
  })

  describe('extractTextFromBuffer', () => {
    it('splits DOCX output into paragraphs and collapses whitespace', async () => {
      extractRawText.mockResolvedValue({
        value: 'ARTICLES OF ASSOCIATION\n\n  1.  The company   name is Test Ltd.\n\n\n2. Registered office\tAbu Dhabi\n',
        messages: [],
      })

      const result = await extractTextFromBuffer(Buffer.from('docx'), '.docx')

      expect(result).toEqual({
        text: 'ARTICLES OF ASSOCIATION 1. The company name is Test Ltd. 2. Registered office Abu Dhabi',
        paragraphs: [
          'ARTICLES OF ASSOCIATION',
          '1.  The company   name is Test Ltd.',
          '2. Registered office\tAbu Dhabi',
        ],
        pageCount: 1,
        format: 'docx',
      })
    })

    it('maps mammoth failures to CorruptDocumentError', async () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      extractRawText.mockRejectedValue(new Error('End of data reached'))

      await expect(extractTextFromBuffer(Buffer.from('x'), 'docx')).rejects.toBeInstanceOf(
        CorruptDocumentError
      )
      consoleSpy.mockRestore()
    })

    it('reads PDF pages in order', async () => {
      extractPdfText.mockResolvedValue({
        totalPages: 2,
        text: ['Board Resolution\nDated 1 May', 'Signed by the directors'],
      })

      const result = await extractTextFromBuffer(Buffer.from('%PDF'), '.pdf')

      expect(extractPdfText).toHaveBeenCalledWith({ destroy }, { mergePages: false })
      expect(destroy).toHaveBeenCalledTimes(1)
      expect(result).toEqual({
        text: 'Board Resolution Dated 1 May Signed by the directors',
        paragraphs: ['Board Resolution', 'Dated 1 May', 'Signed by the directors'],
        pageCount: 2,
        format: 'pdf',
      })
    })

    it('maps password errors to EncryptedDocumentError', async () => {
      getDocumentProxy.mockRejectedValue(new Error('No password given'))

      await expect(extractTextFromBuffer(Buffer.from('%PDF'), '.pdf')).rejects.toBeInstanceOf(
        EncryptedDocumentError
      )
    })

    it('rethrows unknown PDF errors', async () => {
      getDocumentProxy.mockRejectedValue(new Error('worker crashed'))

      await expect(extractTextFromBuffer(Buffer.from('%PDF'), '.pdf')).rejects.toThrow(
        'worker crashed'
      )
    })
  })

  describe('extractText', () => {
    it('reads the file and dispatches on extension', async () => {
      const path = join(dir, 'Upload.DOCX')
      await writeFile(path, 'fake docx bytes')
      extractRawText.mockResolvedValue({ value: 'Employment Contract', messages: [] })

      const result = await extractText(path)

      expect(result.text).toBe('Employment Contract')
      const [{ buffer }] = extractRawText.mock.calls[0]
      expect(buffer.toString()).toBe('fake docx bytes')
    })

    it('fails fast on unsupported types without reading', async () => {
      await expect(extractText(join(dir, 'missing.txt'))).rejects.toBeInstanceOf(
        UnsupportedFileTypeError
      )
      expect(extractRawText).not.toHaveBeenCalled()
    })

    it('raises NotFoundError for a missing file', async () => {
      await expect(extractText(join(dir, 'absent.pdf'))).rejects.toBeInstanceOf(NotFoundError)
    })
  })
})
