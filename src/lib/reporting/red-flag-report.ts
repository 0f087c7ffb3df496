/**
 * @fileoverview Red-flag report writers
 *
 * The JSON report is the model's validated response verbatim. The TSV holds
 * one `snippet<TAB>issue<TAB>law_reference` line per finding and is the
 * input to the annotation writer.
 *
 * @module lib/reporting/red-flag-report
 */

import { mkdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import type { RedFlag, RedFlagReport, ReportPaths } from "./types"

export const REPORT_JSON_FILENAME = "redflag_report.json"
export const FINDINGS_TSV_FILENAME = "redflag_findings.tsv"

function tsvField(value: string): string {
  return value.replace(/[\t\r\n]+/g, " ")
}

export function toFindingsTsv(flags: RedFlag[]): string {
  return flags
    .map((flag) => [flag.snippet, flag.issue, flag.law_reference].map(tsvField).join("\t") + "\n")
    .join("")
}

export function parseFindingsTsv(content: string): RedFlag[] {
  return content
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const [snippet = "", issue = "", lawReference = ""] = line.split("\t")
      return { snippet, issue, law_reference: lawReference }
    })
}

/**
 * Write both report files into `outputDir`, creating it if needed.
 */
export async function writeRedFlagReports(
  report: RedFlagReport,
  outputDir: string
): Promise<ReportPaths> {
  await mkdir(outputDir, { recursive: true })

  const paths: ReportPaths = {
    json: join(outputDir, REPORT_JSON_FILENAME),
    tsv: join(outputDir, FINDINGS_TSV_FILENAME),
  }

  await writeFile(paths.json, JSON.stringify(report, null, 2), "utf-8")
  await writeFile(paths.tsv, toFindingsTsv(report.red_flags), "utf-8")

  return paths
}

export async function readFindingsTsv(path: string): Promise<RedFlag[]> {
  return parseFindingsTsv(await readFile(path, "utf-8"))
}
