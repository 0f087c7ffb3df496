/**
 * @fileoverview Compliance review pipeline
 *
 * Runs one document through every stage in order:
 * extract → classify → checklist → rules → red-flags → annotate
 *
 * Stages are strictly sequential. A failing stage is reported through
 * `onProgress` and raised as `StageFailedError` carrying the stage name;
 * later stages do not run. All clients come in through
 * {@link PipelineDependencies}.
 *
 * @module pipeline/review-document
 */

import { basename, extname, join } from 'node:path'
import { locateChecklist } from '@/agents/checklist-locator'
import { loadChecklistText } from '@/agents/checklist-text'
import { runClassifierAgent } from '@/agents/classifier'
import { findMissingItems } from '@/agents/missing-items'
import { runRedFlagAgent } from '@/agents/red-flag-detector'
import type { ChecklistLookup, ClassificationResult } from '@/agents/types'
import { documentTypeOf } from '@/agents/types'
import { BudgetTracker, type AggregatedUsage } from '@/lib/ai/budget'
import type { AgentModels } from '@/lib/ai/config'
import type { ComparatorOutputMode } from '@/lib/config'
import { extractText } from '@/lib/document-extraction'
import { StageFailedError, toAppError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import { annotateDocument, writeRedFlagReports, type RedFlag, type ReportPaths } from '@/lib/reporting'
import type { BinaryFetcher, HtmlFetcher } from '@/lib/scraping'
import { ensureRuleIndex, retrieveRules, type RuleIndexStatus, type RuleVectorStore } from '@/rules'
import { documentTypesOf, type MappingTable } from './mapping-table'

// ============================================================================
// Types
// ============================================================================

export const PIPELINE_STAGES = ['extract', 'classify', 'checklist', 'rules', 'red-flags', 'annotate'] as const

export type PipelineStage = (typeof PIPELINE_STAGES)[number]

export type StageStatus = 'started' | 'completed' | 'failed'

export type ProgressListener = (stage: PipelineStage, status: StageStatus, message: string) => void

export interface ReviewOptions {
  /** Uploaded .docx or .pdf */
  filePath: string
  outputDir: string
  deepScrape?: boolean
  crawlDepth?: number
  rulesSourceUrl: string
  rulesTopK?: number
  comparatorOutput?: ComparatorOutputMode
}

export interface PipelineDependencies {
  models: AgentModels
  /** Rule store; owns the embedding client used for ingestion and retrieval */
  store: RuleVectorStore
  mappingTable: MappingTable
  fetchHtml?: HtmlFetcher
  fetchBinary?: BinaryFetcher
  scrapePageText?: (url: string) => Promise<string>
  onProgress?: ProgressListener
}

export interface PipelineResult {
  documentType: string
  classification: ClassificationResult
  checklist: ChecklistLookup
  missingItems: string[]
  missingItemsSummary: string
  ruleIndex: RuleIndexStatus
  redFlags: RedFlag[]
  summary: string
  reportPaths: ReportPaths
  annotatedDocumentPath: string
  usage: AggregatedUsage
}

const STAGE_LABELS: Record<PipelineStage, string> = {
  extract: 'Extracting document text',
  classify: 'Classifying document',
  checklist: 'Checking for missing documents',
  rules: 'Loading regulatory rules',
  'red-flags': 'Running red flag detection',
  annotate: 'Adding comments to document',
}

// ============================================================================
// Stage Runner
// ============================================================================

async function runStage<T>(
  stage: PipelineStage,
  onProgress: ProgressListener | undefined,
  fn: () => Promise<T>,
  describe: (value: T) => string
): Promise<T> {
  onProgress?.(stage, 'started', STAGE_LABELS[stage])
  const startedAt = Date.now()

  let value: T
  try {
    value = await fn()
  } catch (error) {
    const stageError = toAppError(error)
    logger.error('Review stage failed', {
      stage,
      code: stageError.code,
      error: stageError.message,
    })
    onProgress?.(stage, 'failed', stageError.message)
    throw new StageFailedError(stage, stageError)
  }

  const message = describe(value)
  logger.info('Review stage completed', { stage, durationMs: Date.now() - startedAt, message })
  onProgress?.(stage, 'completed', message)
  return value
}

/** `<name>_annotated.docx` in the output directory */
export function annotatedPathFor(filePath: string, outputDir: string): string {
  const name = basename(filePath, extname(filePath))
  return join(outputDir, `${name}_annotated.docx`)
}

// ============================================================================
// Pipeline
// ============================================================================

export async function runComplianceReview(
  options: ReviewOptions,
  deps: PipelineDependencies
): Promise<PipelineResult> {
  const { filePath, outputDir, deepScrape, crawlDepth, rulesSourceUrl, rulesTopK, comparatorOutput } =
    options
  const { models, store, mappingTable, fetchHtml, fetchBinary, scrapePageText, onProgress } = deps
  const budgetTracker = new BudgetTracker()

  const document = await runStage(
    'extract',
    onProgress,
    () => extractText(filePath),
    (doc) => `Extracted ${doc.text.length} characters from ${doc.pageCount} page(s)`
  )

  const classification = await runStage(
    'classify',
    onProgress,
    () =>
      runClassifierAgent({
        documentText: document.text,
        documentTypes: documentTypesOf(mappingTable),
        model: models.classifier,
        budgetTracker,
      }),
    (result) =>
      result.kind === 'matched'
        ? `Document classified as: ${result.label}`
        : `Unrecognised document type: ${result.rawLabel}`
  )
  const documentType = documentTypeOf(classification)

  const checklistStage = await runStage(
    'checklist',
    onProgress,
    async () => {
      const checklist = await locateChecklist({
        classification,
        mappingTable,
        documentText: document.text,
        model: models.checklistFilter,
        deepScrape,
        crawlDepth,
        fetchHtml,
        budgetTracker,
      })
      const checklistText = await loadChecklistText(checklist, { fetchBinary })
      const missing = await findMissingItems({
        documentType,
        checklistText,
        uploadedText: document.text,
        model: models.missingItems,
        outputMode: comparatorOutput,
        budgetTracker,
      })
      return { checklist, missing }
    },
    ({ missing }) => `Missing documents/items found: ${missing.missingItems.length}`
  )

  const ruleIndex = await runStage(
    'rules',
    onProgress,
    () => ensureRuleIndex({ store, sourceUrl: rulesSourceUrl, scrapePageText }),
    (status) =>
      status.status === 'skipped'
        ? `Rule index ready (${status.count} chunks)`
        : `Rule index built (${status.chunks} chunks)`
  )

  const redFlagStage = await runStage(
    'red-flags',
    onProgress,
    async () => {
      const rules = await retrieveRules(store, document.text, { topK: rulesTopK })
      const report = await runRedFlagAgent({
        rules,
        documentText: document.text,
        model: models.redFlagDetector,
        budgetTracker,
      })
      const reportPaths = await writeRedFlagReports(report, outputDir)
      return { report, reportPaths }
    },
    ({ report }) => `Red flags detected: ${report.red_flags.length}`
  )

  const annotatedDocumentPath = await runStage(
    'annotate',
    onProgress,
    () =>
      annotateDocument({
        sourcePath: filePath,
        findingsPath: redFlagStage.reportPaths.tsv,
        outputPath: annotatedPathFor(filePath, outputDir),
      }),
    (path) => `Annotated document written to ${path}`
  )

  const usage = budgetTracker.getUsage()
  logger.info('Compliance review finished', {
    documentType,
    missingItems: checklistStage.missing.missingItems.length,
    redFlags: redFlagStage.report.red_flags.length,
    totalTokens: usage.total.total,
  })

  return {
    documentType,
    classification,
    checklist: checklistStage.checklist,
    missingItems: checklistStage.missing.missingItems,
    missingItemsSummary: checklistStage.missing.summary,
    ruleIndex,
    redFlags: redFlagStage.report.red_flags,
    summary: redFlagStage.report.summary,
    reportPaths: redFlagStage.reportPaths,
    annotatedDocumentPath,
    usage,
  }
}
