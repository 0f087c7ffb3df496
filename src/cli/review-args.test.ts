import { describe, it, expect } from 'vitest'
import { ValidationError } from '@/lib/errors'
import { parseReviewArgs } from './review-args'

describe('parseReviewArgs', () => {
  it('leaves unset flags to configuration', () => {
    expect(parseReviewArgs(['upload.docx'])).toEqual({
      kind: 'review',
      filePath: 'upload.docx',
      outputDir: undefined,
      crawlDepth: undefined,
      deepScrape: undefined,
      comparator: undefined,
    })
  })

  it('reads every flag', () => {
    expect(
      parseReviewArgs([
        'upload.pdf',
        '--output-dir',
        'out',
        '--crawl-depth',
        '0',
        '--no-deep-scrape',
        '--comparator',
        'text',
      ])
    ).toEqual({
      kind: 'review',
      filePath: 'upload.pdf',
      outputDir: 'out',
      crawlDepth: 0,
      deepScrape: false,
      comparator: 'text',
    })
  })

  it('returns help without requiring a file', () => {
    expect(parseReviewArgs(['--help'])).toEqual({ kind: 'help' })
  })

  it.each([
    { argv: ['upload.docx', '--comparator', 'fuzzy'], message: 'Unknown comparator mode: fuzzy' },
    { argv: ['upload.docx', '--crawl-depth=-1'], message: 'Invalid crawl depth: -1' },
    { argv: ['upload.docx', '--crawl-depth', '1.5'], message: 'Invalid crawl depth: 1.5' },
    { argv: [], message: 'Expected exactly one document path' },
    { argv: ['a.docx', 'b.docx'], message: 'Expected exactly one document path' },
  ])('rejects $argv as a usage error', ({ argv, message }) => {
    expect(() => parseReviewArgs(argv)).toThrow(ValidationError)
    expect(() => parseReviewArgs(argv)).toThrow(message)
  })

  it('turns unknown flags into a usage error', () => {
    expect(() => parseReviewArgs(['upload.docx', '--verbose'])).toThrow(ValidationError)
  })
})
