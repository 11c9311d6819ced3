/**
 * Ingestion run types
 * @module ingestion/types
 */

import type { MergeConflict } from '../merge/types.js'
import type { RawRow } from '../sources/row-schemas.js'
import type { SourceAdapter, SourceKind, SourcePhase } from '../sources/source-adapter.js'

/**
 * Rows for a source: already in memory, or loaded on demand
 */
export type RowLoader = () => Iterable<RawRow> | Promise<Iterable<RawRow>>

/**
 * One dataset registered with a pipeline
 */
export interface SourceDefinition {
  adapter: SourceAdapter
  load: RowLoader
}

export type SourceStatus = 'completed' | 'failed'

/**
 * A row that was not merged
 */
export interface SourceIssue {
  rowIndex: number
  code: string
  message: string
  field?: string
}

/**
 * Per-source statistics. Every row read is counted exactly once in
 * `skipped`, `filtered`, `created`, `updated` or `unchanged`.
 */
export interface SourceSummary {
  sourceId: string
  kind: SourceKind
  phase: SourcePhase
  status: SourceStatus
  /** Rows read */
  processed: number
  /** Rows rejected by validation, coercion or correlation */
  skipped: number
  /** Rows the source deliberately leaves out */
  filtered: number
  created: number
  updated: number
  unchanged: number
  /** Number of conflicts found */
  conflicts: number
  conflictDetails: MergeConflict[]
  issues: SourceIssue[]
  /** Why the source failed, when it did */
  error?: string
}

export interface IngestionTotals {
  processed: number
  skipped: number
  filtered: number
  created: number
  updated: number
  unchanged: number
  conflicts: number
  failedSources: number
}

export interface IngestionResult {
  /** Summaries in the order the sources were merged */
  sources: SourceSummary[]
  totals: IngestionTotals
  executionTimeMs: number
}
