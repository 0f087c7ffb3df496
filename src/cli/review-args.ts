/**
 * @fileoverview Argument parsing for the review CLI
 *
 * Everything here runs before configuration is loaded, so a bad flag is a
 * usage error and never touches the environment or the rule store.
 *
 * @module cli/review-args
 */

import { parseArgs } from 'node:util'
import type { ComparatorOutputMode } from '@/lib/config'
import { ValidationError } from '@/lib/errors'

export const REVIEW_USAGE = `Usage: compliance-review <file.docx|file.pdf> [options]

Options:
  --output-dir <dir>      Report directory (default: OUTPUT_DIR or "reports")
  --crawl-depth <n>       Link depth when crawling checklist sites (default: CRAWL_DEPTH or 2)
  --no-deep-scrape        Read only the mapped page instead of crawling
  --comparator <mode>     Missing-item output mode: structured | text
  -h, --help              Show this message`

export type ReviewArgs =
  | { kind: 'help' }
  | {
      kind: 'review'
      filePath: string
      outputDir?: string
      crawlDepth?: number
      /** Only ever false; unset means "use DEEP_SCRAPE" */
      deepScrape?: false
      comparator?: ComparatorOutputMode
    }

function parseCrawlDepth(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const depth = Number(value)
  if (value.trim() === '' || !Number.isInteger(depth) || depth < 0) {
    throw new ValidationError(`Invalid crawl depth: ${value}`, [
      { field: 'crawl-depth', message: 'Must be a non-negative integer' },
    ])
  }
  return depth
}

function parseComparator(value: string | undefined): ComparatorOutputMode | undefined {
  if (value === undefined || value === 'structured' || value === 'text') return value
  throw new ValidationError(`Unknown comparator mode: ${value}`, [
    { field: 'comparator', message: 'Must be "structured" or "text"' },
  ])
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'output-dir': { type: 'string' },
      'crawl-depth': { type: 'string' },
      'no-deep-scrape': { type: 'boolean', default: false },
      comparator: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  })
}

/**
 * @throws ValidationError - unknown flag, missing or extra file argument, bad flag value
 */
export function parseReviewArgs(argv: string[]): ReviewArgs {
  let parsed: ReturnType<typeof parseFlags>
  try {
    parsed = parseFlags(argv)
  } catch (error) {
    // node:util reports unknown or malformed flags as TypeError
    if (error instanceof TypeError) {
      throw new ValidationError(error.message)
    }
    throw error
  }

  const { values, positionals } = parsed
  if (values.help) return { kind: 'help' }

  if (positionals.length !== 1) {
    throw new ValidationError('Expected exactly one document path', [
      { field: 'file', message: `Received ${positionals.length} positional arguments` },
    ])
  }

  return {
    kind: 'review',
    filePath: positionals[0],
    outputDir: values['output-dir'],
    crawlDepth: parseCrawlDepth(values['crawl-depth']),
    deepScrape: values['no-deep-scrape'] ? false : undefined,
    comparator: parseComparator(values.comparator),
  }
}
