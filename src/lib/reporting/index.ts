/**
 * @fileoverview Reporting barrel export
 * @module lib/reporting
 */

export {
  writeRedFlagReports,
  readFindingsTsv,
  toFindingsTsv,
  parseFindingsTsv,
  REPORT_JSON_FILENAME,
  FINDINGS_TSV_FILENAME,
} from "./red-flag-report"
export { annotateDocument, buildAnnotatedDocx, planAnnotations, type AnnotationPlan } from "./annotate-document"
export type { RedFlag, RedFlagReport, ReportPaths } from "./types"
