/**
 * @fileoverview Environment configuration
 *
 * Parses `process.env` into a typed {@link AppConfig}. Validation runs once at
 * startup and fails fast with every invalid variable listed.
 *
 * @module lib/config
 */

import { z } from "zod"
import { ConfigurationError } from "./errors"

export const DEFAULT_RULES_SOURCE_URL = "https://en.adgm.thomsonreuters.com/entiresection/1"

const booleanString = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes")

const envSchema = z.object({
  AI_GATEWAY_API_KEY: z.string().min(1, "AI_GATEWAY_API_KEY is required"),
  VOYAGE_API_KEY: z.string().min(1, "VOYAGE_API_KEY is required"),
  RULES_SOURCE_URL: z.url().default(DEFAULT_RULES_SOURCE_URL),
  RULES_DB_DIR: z.string().min(1).default(".data/rules-db"),
  RULES_COLLECTION: z.string().min(1).default("regulatory_rules"),
  MAPPING_TABLE_PATH: z.string().min(1).default("data/mapping-table.json"),
  OUTPUT_DIR: z.string().min(1).default("reports"),
  CRAWL_DEPTH: z.coerce.number().int().min(0).max(5).default(2),
  DEEP_SCRAPE: booleanString.default(true),
  RULES_TOP_K: z.coerce.number().int().min(1).max(50).default(5),
  COMPARATOR_OUTPUT: z.enum(["structured", "text"]).default("structured"),
  SENTRY_DSN: z.string().optional(),
})

export type ComparatorOutputMode = "structured" | "text"

export interface AppConfig {
  gatewayApiKey: string
  voyageApiKey: string
  rulesSourceUrl: string
  rulesDbDir: string
  rulesCollection: string
  mappingTablePath: string
  outputDir: string
  crawlDepth: number
  deepScrape: boolean
  rulesTopK: number
  comparatorOutput: ComparatorOutputMode
  sentryDsn?: string
}

/**
 * Load configuration from an environment map.
 *
 * Empty strings are treated as unset so `.env` placeholders fall back to
 * defaults (or fail the required check).
 *
 * @throws ConfigurationError - one detail entry per invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  )

  const parsed = envSchema.safeParse(cleaned)
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => ({
      field: issue.path.map(String).join("."),
      message: issue.message,
    }))
    throw new ConfigurationError(
      `Invalid environment: ${details.map((d) => d.field).join(", ")}`,
      details
    )
  }

  const e = parsed.data
  return {
    gatewayApiKey: e.AI_GATEWAY_API_KEY,
    voyageApiKey: e.VOYAGE_API_KEY,
    rulesSourceUrl: e.RULES_SOURCE_URL,
    rulesDbDir: e.RULES_DB_DIR,
    rulesCollection: e.RULES_COLLECTION,
    mappingTablePath: e.MAPPING_TABLE_PATH,
    outputDir: e.OUTPUT_DIR,
    crawlDepth: e.CRAWL_DEPTH,
    deepScrape: e.DEEP_SCRAPE,
    rulesTopK: e.RULES_TOP_K,
    comparatorOutput: e.COMPARATOR_OUTPUT,
    sentryDsn: e.SENTRY_DSN,
  }
}
