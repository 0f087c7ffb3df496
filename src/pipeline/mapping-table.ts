/**
 * @fileoverview Document type mapping table
 *
 * Maps each document type the classifier may choose to where its checklist
 * lives: a local checklist file, a direct document URL, or an official site
 * root to crawl. The table is a JSON object loaded from disk; key order is
 * the classifier's vocabulary order.
 *
 * @module pipeline/mapping-table
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigurationError, NotFoundError, ValidationError } from '@/lib/errors'

export type MappingTable = Readonly<Record<string, string>>

const mappingTableSchema = z
  .record(z.string().trim().min(1), z.string().trim().min(1))
  .refine((table) => Object.keys(table).length > 0, { message: 'Mapping table is empty' })

/** Document types in table order */
export function documentTypesOf(table: MappingTable): string[] {
  return Object.keys(table)
}

/** Mapping value for a type; own keys only */
export function mappingValueFor(table: MappingTable, documentType: string): string | undefined {
  return Object.hasOwn(table, documentType) ? table[documentType] : undefined
}

/** True when a mapping value names a file on disk rather than a web address */
export function isLocalPath(value: string): boolean {
  return !/^https?:\/\//i.test(value)
}

export function parseMappingTable(value: unknown): MappingTable {
  const parsed = mappingTableSchema.safeParse(value)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, 'Invalid mapping table')
  }
  return parsed.data
}

/**
 * @throws NotFoundError - file missing
 * @throws ConfigurationError - file is not JSON
 * @throws ValidationError - JSON is not a non-empty string-to-string object
 */
export async function loadMappingTable(path: string): Promise<MappingTable> {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new NotFoundError(`Mapping table not found: ${path}`)
    }
    throw error
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Mapping table ${path} is not valid JSON: ${reason}`)
  }

  return parseMappingTable(json)
}
