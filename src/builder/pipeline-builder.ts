import { AliasResolver } from '../aliases/alias-resolver.js'
import type { AliasTable } from '../aliases/alias-table.js'
import { loadStadiumAliases, loadTeamAliases } from '../aliases/alias-table.js'
import { IngestionPipeline } from '../ingestion/ingestion-pipeline.js'
import type { RowLoader, SourceDefinition } from '../ingestion/types.js'
import { readCsvRows } from '../sources/csv-reader.js'
import { CupMatchesAdapter } from '../sources/cup-matches.js'
import { ExtendedStatsAdapter } from '../sources/extended-stats.js'
import { HistoricalArchiveAdapter } from '../sources/historical-archive.js'
import { InternationalMatchesAdapter } from '../sources/international-matches.js'
import { LeagueMatchesAdapter } from '../sources/league-matches.js'
import { PlayerRosterAdapter } from '../sources/player-roster.js'
import type { RawRow } from '../sources/row-schemas.js'
import type {
  AdapterResolvers,
  SourceAdapter,
  SourceAdapterOptions,
  SourceKind,
} from '../sources/source-adapter.js'
import type { GraphStore } from '../store/graph-store.js'
import { InMemoryGraphStore } from '../store/in-memory-graph-store.js'
import type { CompetitionRef } from '../types/records.js'
import type { MatchSourceCompetitions, PipelineConfig } from '../types/config.js'
import { DEFAULT_PIPELINE_CONFIG } from '../types/config.js'
import { COMPETITION_TYPES } from '../types/model.js'
import { requireNonEmptyString, requireOneOf, requirePositiveInteger } from '../utils/errors.js'
import type { Logger } from '../utils/logger.js'
import { createPrefixedLogger, createSilentLogger } from '../utils/logger.js'

/**
 * Rows of a source: a CSV file path, rows already in memory, or a function
 * producing them when the pipeline runs
 */
export type RowsInput = string | Iterable<RawRow> | RowLoader

/**
 * Per-source options accepted by every source method
 */
export type SourceOptions = Pick<SourceAdapterOptions, 'sourceId' | 'priority'>

export interface MatchSourceBuilderOptions extends SourceOptions {
  /** Overrides the pipeline-wide competition for this source */
  competition?: CompetitionRef
}

export interface PlayerRosterBuilderOptions extends SourceOptions {
  /** Overrides the pipeline-wide roster nationality for this source */
  nationality?: string
}

/**
 * Everything a source needs once the pipeline is built
 */
export interface SourceContext {
  resolvers: AdapterResolvers
  config: PipelineConfig
  logger: Logger
}

/**
 * Creates the adapter of a custom source
 */
export type AdapterFactory = (context: SourceContext) => SourceAdapter

interface SourceRegistration {
  create: AdapterFactory
  rows: RowsInput
}

function toLoader(rows: RowsInput, sourceId: string): RowLoader {
  if (typeof rows === 'string') return () => readCsvRows(rows, sourceId)
  if (typeof rows === 'function') return rows
  const iterable = rows
  return () => iterable
}

/**
 * Fluent builder for configuring and creating an IngestionPipeline.
 *
 * Sources can be registered in any order; the pipeline always merges
 * entity sources before correlation sources. Alias tables default to the
 * bundled team and stadium tables. Resolvers are created on `build()`, so
 * their lookup caches live exactly as long as one pipeline.
 *
 * @example
 * ```typescript
 * const pipeline = Scoreline.pipeline()
 *   .logger(defaultLogger)
 *   .concurrency(4)
 *   .leagueMatches('data/brasileirao.csv')
 *   .cupMatches('data/copa-do-brasil.csv')
 *   .extendedStats('data/match-stats.csv')
 *   .playerRoster('data/players.csv', { nationality: 'Brazil' })
 *   .build()
 *
 * await pipeline.run()
 * const table = await pipeline.query().standings('Brasileirão Série A', 2023)
 * ```
 */
export class PipelineBuilder {
  private storeInstance?: GraphStore
  private loggerInstance?: Logger
  private clockFunction?: () => Date
  private teamTable?: AliasTable
  private stadiumTable?: AliasTable
  private concurrencyValue = DEFAULT_PIPELINE_CONFIG.concurrency
  private nationality = DEFAULT_PIPELINE_CONFIG.rosterNationality
  private maxDistanceMinutes = DEFAULT_PIPELINE_CONFIG.correlation.maxDistanceMinutes
  private readonly competitions: MatchSourceCompetitions = {
    ...DEFAULT_PIPELINE_CONFIG.competitions,
  }
  private readonly registrations: SourceRegistration[] = []

  /**
   * Store to ingest into (default: a new InMemoryGraphStore)
   */
  store(store: GraphStore): this {
    this.storeInstance = store
    return this
  }

  logger(logger: Logger): this {
    this.loggerInstance = logger
    return this
  }

  /**
   * Time source for creation timestamps (default: `new Date()`)
   */
  clock(clock: () => Date): this {
    this.clockFunction = clock
    return this
  }

  /**
   * Number of records merged concurrently within one source
   */
  concurrency(value: number): this {
    this.concurrencyValue = requirePositiveInteger(value, 'concurrency')
    return this
  }

  /**
   * Nationality kept by player roster sources
   */
  rosterNationality(nationality: string): this {
    this.nationality = requireNonEmptyString(nationality, 'nationality')
    return this
  }

  /**
   * Competition the league, cup or international source files matches under
   */
  competition(source: keyof MatchSourceCompetitions, competition: CompetitionRef): this {
    requireNonEmptyString(competition.name, 'competition.name')
    if (competition.type !== undefined) {
      requireOneOf(competition.type, COMPETITION_TYPES, 'competition.type')
    }
    this.competitions[source] = { ...competition }
    return this
  }

  /**
   * Largest distance in minutes between a statistics row and its match
   */
  correlationWindow(minutes: number): this {
    this.maxDistanceMinutes = requirePositiveInteger(minutes, 'minutes')
    return this
  }

  teamAliases(table: AliasTable): this {
    this.teamTable = table
    return this
  }

  stadiumAliases(table: AliasTable): this {
    this.stadiumTable = table
    return this
  }

  leagueMatches(rows: RowsInput, options: MatchSourceBuilderOptions = {}): this {
    return this.register(rows, ({ resolvers, config, logger }) =>
      new LeagueMatchesAdapter(resolvers, {
        ...options,
        competition: options.competition ?? config.competitions.league,
        logger: this.sourceLogger(logger, 'league-matches', options),
      })
    )
  }

  cupMatches(rows: RowsInput, options: MatchSourceBuilderOptions = {}): this {
    return this.register(rows, ({ resolvers, config, logger }) =>
      new CupMatchesAdapter(resolvers, {
        ...options,
        competition: options.competition ?? config.competitions.cup,
        logger: this.sourceLogger(logger, 'cup-matches', options),
      })
    )
  }

  internationalMatches(rows: RowsInput, options: MatchSourceBuilderOptions = {}): this {
    return this.register(rows, ({ resolvers, config, logger }) =>
      new InternationalMatchesAdapter(resolvers, {
        ...options,
        competition: options.competition ?? config.competitions.international,
        logger: this.sourceLogger(logger, 'international-matches', options),
      })
    )
  }

  extendedStats(rows: RowsInput, options: SourceOptions = {}): this {
    return this.register(rows, ({ resolvers, logger }) =>
      new ExtendedStatsAdapter(resolvers, {
        ...options,
        logger: this.sourceLogger(logger, 'extended-stats', options),
      })
    )
  }

  historicalArchive(rows: RowsInput, options: SourceOptions = {}): this {
    return this.register(rows, ({ resolvers, logger }) =>
      new HistoricalArchiveAdapter(resolvers, {
        ...options,
        logger: this.sourceLogger(logger, 'historical-archive', options),
      })
    )
  }

  playerRoster(rows: RowsInput, options: PlayerRosterBuilderOptions = {}): this {
    return this.register(rows, ({ resolvers, config, logger }) =>
      new PlayerRosterAdapter(resolvers, {
        ...options,
        nationality: options.nationality ?? config.rosterNationality,
        logger: this.sourceLogger(logger, 'player-roster', options),
      })
    )
  }

  /**
   * Registers a source with a custom adapter
   *
   * @example
   * ```typescript
   * .source(({ resolvers }) => new CupMatchesAdapter(resolvers, {
   *   sourceId: 'copa-sul-americana',
   *   competition: { name: 'Copa Sul-Americana', type: 'international' },
   * }), rows)
   * ```
   */
  source(create: AdapterFactory, rows: RowsInput): this {
    return this.register(rows, create)
  }

  /**
   * Build and return the configured IngestionPipeline.
   *
   * @throws {ConfigurationError} If two sources share a source id
   */
  build(): IngestionPipeline {
    const logger = this.loggerInstance ?? createSilentLogger()
    const config: PipelineConfig = {
      concurrency: this.concurrencyValue,
      rosterNationality: this.nationality,
      competitions: { ...this.competitions },
      correlation: { maxDistanceMinutes: this.maxDistanceMinutes },
    }
    const resolvers: AdapterResolvers = {
      teams: new AliasResolver(this.teamTable ?? loadTeamAliases(), {
        logger: createPrefixedLogger('aliases', logger),
        kind: 'team',
      }),
      stadiums: new AliasResolver(this.stadiumTable ?? loadStadiumAliases(), {
        logger: createPrefixedLogger('aliases', logger),
        kind: 'stadium',
      }),
    }

    const context: SourceContext = { resolvers, config, logger }
    const sources: SourceDefinition[] = this.registrations.map(({ create, rows }) => {
      const adapter = create(context)
      return { adapter, load: toLoader(rows, adapter.sourceId) }
    })

    return new IngestionPipeline({
      store: this.storeInstance ?? new InMemoryGraphStore(),
      sources,
      teamResolver: resolvers.teams,
      config,
      logger,
      clock: this.clockFunction,
    })
  }

  private register(rows: RowsInput, create: AdapterFactory): this {
    this.registrations.push({ create, rows })
    return this
  }

  private sourceLogger(logger: Logger, kind: SourceKind, options: SourceOptions): Logger {
    return createPrefixedLogger(options.sourceId ?? kind, logger)
  }
}

/**
 * Main entry point for building an ingestion pipeline.
 *
 * @example
 * ```typescript
 * import { Scoreline } from 'scoreline'
 *
 * const pipeline = Scoreline.pipeline()
 *   .leagueMatches(leagueRows)
 *   .build()
 * ```
 */
export const Scoreline = {
  /**
   * Create a new pipeline builder.
   */
  pipeline(): PipelineBuilder {
    return new PipelineBuilder()
  },
}
