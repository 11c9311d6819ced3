/**
 * CSV file loading for the dataset adapters
 * @module sources/csv-reader
 */

import { readFileSync } from 'node:fs'
import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import { errorMessage } from '../utils/errors.js'
import { SourceReadError } from './ingestion-error.js'
import type { RawRow } from './row-schemas.js'

const csvRowsSchema = z.array(z.record(z.string(), z.string()))

/**
 * Parses CSV text with a header line into rows keyed by column name.
 * Cells are trimmed and blank lines skipped.
 *
 * @throws {SourceReadError} If the text is not valid CSV
 */
export function parseCsvRows(text: string, sourceId = 'csv'): RawRow[] {
  let parsed: unknown
  try {
    parsed = parse(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
      relax_column_count: true,
    })
  } catch (error) {
    throw new SourceReadError(sourceId, errorMessage(error))
  }

  const rows = csvRowsSchema.safeParse(parsed)
  if (!rows.success) {
    throw new SourceReadError(sourceId, 'unexpected CSV structure')
  }
  return rows.data
}

/**
 * Reads a UTF-8 CSV file with a header line.
 *
 * @throws {SourceReadError} If the file cannot be read or parsed
 */
export function readCsvRows(path: string, sourceId = path): RawRow[] {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (error) {
    throw new SourceReadError(sourceId, errorMessage(error), { path })
  }
  return parseCsvRows(text, sourceId)
}
