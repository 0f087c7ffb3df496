#!/usr/bin/env -S npx tsx
/**
 * Compliance review CLI
 *
 * Reviews one .docx or .pdf and prints the run summary as JSON. Reports and
 * the annotated copy are written to the output directory.
 *
 * Usage: npm run review -- <file> [--output-dir <dir>] [--crawl-depth <n>]
 *                                 [--no-deep-scrape] [--comparator structured|text]
 */

import { createAgentModels } from '@/lib/ai/config'
import { ValidationError } from '@/lib/errors'
import { loadMappingTable, runComplianceReview, type PipelineResult, type ProgressListener } from '@/pipeline'
import { parseReviewArgs, REVIEW_USAGE, type ReviewArgs } from './review-args'
import { runCli } from './runtime'

const printProgress: ProgressListener = (stage, status, message) => {
  const marker = status === 'started' ? '…' : status === 'completed' ? '✓' : '✗'
  console.error(`[${stage}] ${marker} ${message}`)
}

function toSummary(result: PipelineResult) {
  return {
    documentType: result.documentType,
    classification: result.classification,
    officialUrl: result.checklist.officialUrl,
    checklistDocuments: result.checklist.checklistDocuments,
    missingItems: result.missingItems,
    redFlags: result.redFlags,
    summary: result.summary,
    reports: result.reportPaths,
    annotatedDocument: result.annotatedDocumentPath,
    usage: result.usage.total,
  }
}

function review(args: Extract<ReviewArgs, { kind: 'review' }>): Promise<number> {
  return runCli(async ({ config, store }) => {
    const result = await runComplianceReview(
      {
        filePath: args.filePath,
        outputDir: args.outputDir ?? config.outputDir,
        deepScrape: args.deepScrape ?? config.deepScrape,
        crawlDepth: args.crawlDepth ?? config.crawlDepth,
        rulesSourceUrl: config.rulesSourceUrl,
        rulesTopK: config.rulesTopK,
        comparatorOutput: args.comparator ?? config.comparatorOutput,
      },
      {
        models: createAgentModels(config.gatewayApiKey),
        store,
        mappingTable: await loadMappingTable(config.mappingTablePath),
        onProgress: printProgress,
      }
    )

    console.log(JSON.stringify(toSummary(result), null, 2))
    return 0
  })
}

let args: ReviewArgs | undefined
try {
  args = parseReviewArgs(process.argv.slice(2))
} catch (error) {
  if (!(error instanceof ValidationError)) throw error
  console.error(`${error.message}\n\n${REVIEW_USAGE}`)
  process.exitCode = 2
}

if (args?.kind === 'help') {
  console.log(REVIEW_USAGE)
} else if (args?.kind === 'review') {
  process.exitCode = await review(args)
}
