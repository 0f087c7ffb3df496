/**
 * @fileoverview Report type definitions
 * @module lib/reporting/types
 */

/** One compliance finding as persisted in the JSON report */
export interface RedFlag {
  issue: string
  law_reference: string
  snippet: string
}

export interface RedFlagReport {
  summary: string
  red_flags: RedFlag[]
}

export interface ReportPaths {
  json: string
  tsv: string
}
