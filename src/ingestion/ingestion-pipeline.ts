/**
 * Ingestion pipeline: load every source, adapt its rows and merge the
 * resulting records into one store
 * @module ingestion/ingestion-pipeline
 */

import type { AliasResolver } from '../aliases/alias-resolver.js'
import { MergeEngine } from '../merge/merge-engine.js'
import { TeamDeduplicator } from '../merge/dedup.js'
import type { DeduplicationReport } from '../merge/dedup.js'
import { KeyedLock } from '../merge/keyed-lock.js'
import { QueryEngine } from '../query/query-engine.js'
import { CorrelationMissError, IngestionError } from '../sources/ingestion-error.js'
import type { AdaptOutcome } from '../sources/source-adapter.js'
import type { GraphStore } from '../store/graph-store.js'
import type { CanonicalRecord } from '../types/records.js'
import type { PipelineConfig } from '../types/config.js'
import { DEFAULT_PIPELINE_CONFIG } from '../types/config.js'
import {
  ConfigurationError,
  errorMessage,
  isScorelineError,
  requirePositiveInteger,
} from '../utils/errors.js'
import type { Logger } from '../utils/logger.js'
import { createPrefixedLogger, createSilentLogger } from '../utils/logger.js'
import type {
  IngestionResult,
  IngestionTotals,
  SourceDefinition,
  SourceSummary,
} from './types.js'

export interface IngestionPipelineOptions {
  store: GraphStore
  sources: SourceDefinition[]
  /** Team resolver shared with the adapters; used for deduplication and queries */
  teamResolver: AliasResolver
  config?: Partial<PipelineConfig>
  logger?: Logger
  clock?: () => Date
}

/**
 * Orders sources so that the merged result does not depend on registration
 * order: entity sources before correlation sources, then by priority, then
 * by source id.
 */
export function orderSources(sources: readonly SourceDefinition[]): SourceDefinition[] {
  const phaseRank = { entity: 0, correlation: 1 } as const
  return [...sources].sort((a, b) => {
    const phase = phaseRank[a.adapter.phase] - phaseRank[b.adapter.phase]
    if (phase !== 0) return phase
    const priority = a.adapter.priority - b.adapter.priority
    if (priority !== 0) return priority
    return a.adapter.sourceId.localeCompare(b.adapter.sourceId)
  })
}

function emptySummary(definition: SourceDefinition): SourceSummary {
  return {
    sourceId: definition.adapter.sourceId,
    kind: definition.adapter.kind,
    phase: definition.adapter.phase,
    status: 'completed',
    processed: 0,
    skipped: 0,
    filtered: 0,
    created: 0,
    updated: 0,
    unchanged: 0,
    conflicts: 0,
    conflictDetails: [],
    issues: [],
  }
}

type Prepared =
  | { definition: SourceDefinition; outcomes: AdaptOutcome<CanonicalRecord>[] }
  | { definition: SourceDefinition; error: string }

/**
 * Runs a set of sources into one store.
 *
 * Rows of all sources are loaded and adapted in parallel. Records are then
 * merged source by source in canonical order, each source with a window of
 * `concurrency` records in flight; per-key locking keeps records that share
 * an entity in emission order. A source that cannot be read fails on its
 * own and the others still run.
 *
 * @example
 * ```typescript
 * const pipeline = Scoreline.pipeline()
 *   .leagueMatches('data/league.csv')
 *   .extendedStats('data/stats.csv')
 *   .build()
 *
 * const result = await pipeline.run()
 * for (const source of result.sources) {
 *   console.log(source.sourceId, source.processed, source.skipped)
 * }
 * ```
 */
export class IngestionPipeline {
  readonly store: GraphStore
  readonly teamResolver: AliasResolver
  readonly config: PipelineConfig
  private readonly sources: SourceDefinition[]
  private readonly logger: Logger
  private readonly engine: MergeEngine

  constructor(options: IngestionPipelineOptions) {
    this.store = options.store
    this.teamResolver = options.teamResolver
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...options.config }
    requirePositiveInteger(this.config.concurrency, 'concurrency')
    this.validateSources(options.sources)

    this.sources = orderSources(options.sources)
    const logger = options.logger ?? createSilentLogger()
    this.logger = createPrefixedLogger('ingestion', logger)
    this.engine = new MergeEngine(this.store, {
      logger: createPrefixedLogger('merge', logger),
      clock: options.clock,
      correlation: this.config.correlation,
      lock: new KeyedLock(),
    })
  }

  /**
   * Source ids in the order they are merged
   */
  get sourceOrder(): string[] {
    return this.sources.map((s) => s.adapter.sourceId)
  }

  async run(): Promise<IngestionResult> {
    const startTime = Date.now()
    const prepared = await Promise.all(this.sources.map((s) => this.prepare(s)))

    const summaries: SourceSummary[] = []
    for (const source of prepared) {
      summaries.push(await this.mergeSource(source))
    }

    const result: IngestionResult = {
      sources: summaries,
      totals: totalsOf(summaries),
      executionTimeMs: Date.now() - startTime,
    }
    this.logger.info('Ingestion finished', { ...result.totals })
    return result
  }

  /**
   * Folds teams whose stored names now resolve to another canonical team.
   */
  async deduplicateTeams(): Promise<DeduplicationReport> {
    return new TeamDeduplicator(this.store, this.teamResolver, {
      logger: this.logger,
    }).deduplicateTeams()
  }

  /**
   * Query engine over this pipeline's store and team resolver
   */
  query(): QueryEngine {
    return new QueryEngine(this.store, this.teamResolver)
  }

  private validateSources(sources: readonly SourceDefinition[]): void {
    const seen = new Set<string>()
    for (const { adapter } of sources) {
      if (seen.has(adapter.sourceId)) {
        throw new ConfigurationError(`Duplicate source id '${adapter.sourceId}'`, 'sourceId')
      }
      seen.add(adapter.sourceId)
    }
  }

  private async prepare(definition: SourceDefinition): Promise<Prepared> {
    try {
      const rows = await definition.load()
      return { definition, outcomes: Array.from(definition.adapter.adapt(rows)) }
    } catch (error) {
      this.logger.error('Source could not be read', {
        sourceId: definition.adapter.sourceId,
        ...(isScorelineError(error) ? { code: error.code } : {}),
        error: errorMessage(error),
      })
      return { definition, error: errorMessage(error) }
    }
  }

  private async mergeSource(prepared: Prepared): Promise<SourceSummary> {
    const summary = emptySummary(prepared.definition)
    if ('error' in prepared) {
      summary.status = 'failed'
      summary.error = prepared.error
      return summary
    }

    const { outcomes } = prepared
    const window = this.config.concurrency
    for (let offset = 0; offset < outcomes.length; offset += window) {
      const batch = outcomes.slice(offset, offset + window)
      await Promise.all(batch.map((outcome) => this.mergeOutcome(outcome, summary)))
    }

    summary.issues.sort((a, b) => a.rowIndex - b.rowIndex)
    this.logger.info('Source merged', {
      sourceId: summary.sourceId,
      processed: summary.processed,
      skipped: summary.skipped,
      conflicts: summary.conflicts,
    })
    return summary
  }

  private async mergeOutcome(
    outcome: AdaptOutcome<CanonicalRecord>,
    summary: SourceSummary
  ): Promise<void> {
    summary.processed++

    switch (outcome.status) {
      case 'filtered':
        summary.filtered++
        return
      case 'issue':
        summary.skipped++
        summary.issues.push({
          rowIndex: outcome.rowIndex,
          code: outcome.issue.code,
          message: outcome.issue.message,
          field: outcome.issue.field,
        })
        return
      case 'record':
        break
    }

    try {
      const result = await this.engine.merge(outcome.record)
      summary[result.outcome]++
      summary.conflicts += result.conflicts.length
      summary.conflictDetails.push(...result.conflicts)
    } catch (error) {
      if (!(error instanceof IngestionError)) throw error

      if (error instanceof CorrelationMissError) {
        this.logger.debug('Row not correlated', {
          sourceId: summary.sourceId,
          rowIndex: outcome.rowIndex,
          reason: error.reason,
        })
      }
      summary.skipped++
      summary.issues.push({
        rowIndex: outcome.rowIndex,
        code: error.code,
        message: error.message,
      })
    }
  }
}

function totalsOf(summaries: readonly SourceSummary[]): IngestionTotals {
  const totals: IngestionTotals = {
    processed: 0,
    skipped: 0,
    filtered: 0,
    created: 0,
    updated: 0,
    unchanged: 0,
    conflicts: 0,
    failedSources: 0,
  }
  for (const summary of summaries) {
    totals.processed += summary.processed
    totals.skipped += summary.skipped
    totals.filtered += summary.filtered
    totals.created += summary.created
    totals.updated += summary.updated
    totals.unchanged += summary.unchanged
    totals.conflicts += summary.conflicts
    if (summary.status === 'failed') totals.failedSources++
  }
  return totals
}
