/**
 * Read-only aggregation over the merged store
 * @module query/query-engine
 */

import type { AliasResolver } from '../aliases/alias-resolver.js'
import { seasonKey, teamKey } from '../core/identity-keys.js'
import { deriveResult, pointsFor } from '../core/match-result.js'
import { foldName } from '../core/normalizers/basic.js'
import type { GraphStore } from '../store/graph-store.js'
import type {
  MatchNode,
  MatchResult,
  PlayerNode,
  StadiumNode,
  TeamNode,
} from '../types/model.js'
import {
  InvalidParameterError,
  requireNonEmptyString,
  requirePositiveInteger,
} from '../utils/errors.js'
import type {
  CompetitionTotals,
  CrossCompetitionTotals,
  FormEntry,
  FormOptions,
  GoalAverage,
  HeadToHead,
  RecordLine,
  ScoringRow,
  StandingsRow,
  StatisticsScope,
  TeamMatchFilter,
  TeamStatistics,
  Venue,
  WinRecord,
} from './types.js'

const DEFAULT_FORM_LIMIT = 5
const DEFAULT_RANKING_LIMIT = 10

/**
 * One team's side of one match
 */
interface Appearance {
  match: MatchNode
  venue: Venue
  opponent: string
  goalsFor: number
  goalsAgainst: number
  result: MatchResult
}

function emptyLine(): RecordLine {
  return {
    played: 0,
    wins: 0,
    draws: 0,
    losses: 0,
    goalsFor: 0,
    goalsAgainst: 0,
    goalDifference: 0,
    points: 0,
    cleanSheets: 0,
  }
}

function addToLine(line: RecordLine, goalsFor: number, goalsAgainst: number): void {
  const result = deriveResult(goalsFor, goalsAgainst)
  line.played++
  line.goalsFor += goalsFor
  line.goalsAgainst += goalsAgainst
  line.goalDifference = line.goalsFor - line.goalsAgainst
  line.points += pointsFor(result)
  if (goalsAgainst === 0) line.cleanSheets++
  if (result === 'WIN') line.wins++
  else if (result === 'DRAW') line.draws++
  else line.losses++
}

function perMatch(value: number, played: number): number {
  return played > 0 ? Math.round((value / played) * 100) / 100 : 0
}

function toStatistics(team: string, line: RecordLine): TeamStatistics {
  return {
    team,
    ...line,
    winPercentage: perMatch(line.wins * 100, line.played),
    averageGoalsScored: perMatch(line.goalsFor, line.played),
    averageGoalsConceded: perMatch(line.goalsAgainst, line.played),
  }
}

function inScope(match: MatchNode, scope: StatisticsScope): boolean {
  if (scope.season !== undefined && match.season !== scope.season) return false
  if (scope.competition !== undefined && match.competition !== scope.competition) return false
  return true
}

/** Oldest first; equal start times by match key */
function byKickOff(a: MatchNode, b: MatchNode): number {
  const time = a.startTime.getTime() - b.startTime.getTime()
  return time !== 0 ? time : a.key.localeCompare(b.key)
}

/** Most recent first; equal start times by match key */
function byRecency(a: MatchNode, b: MatchNode): number {
  const time = b.startTime.getTime() - a.startTime.getTime()
  return time !== 0 ? time : a.key.localeCompare(b.key)
}

/**
 * Answers statistics questions against a store that is not being ingested
 * into. Every team argument is passed through the alias resolver, so any
 * known spelling of a team works.
 *
 * @example
 * ```typescript
 * const query = new QueryEngine(store, createTeamResolver())
 * const stats = await query.teamStatistics('Mengão', { season: 2023 })
 * ```
 */
export class QueryEngine {
  constructor(
    private readonly store: GraphStore,
    private readonly resolver: AliasResolver
  ) {}

  /**
   * Win/draw/loss record of a team, optionally limited to a season and a
   * competition. A team without matches in scope gets an all-zero record.
   */
  async teamStatistics(team: string, scope: StatisticsScope = {}): Promise<TeamStatistics> {
    const name = this.teamName(team)
    const line = emptyLine()
    for (const appearance of await this.appearances(name)) {
      if (!inScope(appearance.match, scope)) continue
      addToLine(line, appearance.goalsFor, appearance.goalsAgainst)
    }
    return toStatistics(name, line)
  }

  /**
   * Record of every meeting between two teams, from `teamA`'s side.
   * Swapping the arguments swaps the A and B columns.
   */
  async headToHead(teamA: string, teamB: string): Promise<HeadToHead> {
    const nameA = this.teamName(teamA)
    const nameB = this.teamName(teamB)
    const summary: HeadToHead = {
      teamA: nameA,
      teamB: nameB,
      matches: 0,
      teamAWins: 0,
      teamBWins: 0,
      draws: 0,
      teamAGoals: 0,
      teamBGoals: 0,
    }
    if (nameA === nameB) return summary

    for (const appearance of await this.appearances(nameA)) {
      if (appearance.opponent !== nameB) continue
      summary.matches++
      summary.teamAGoals += appearance.goalsFor
      summary.teamBGoals += appearance.goalsAgainst
      if (appearance.result === 'WIN') summary.teamAWins++
      else if (appearance.result === 'LOSS') summary.teamBWins++
      else summary.draws++
    }
    return summary
  }

  /**
   * League table of one season of a competition: points, then goal
   * difference, then goals scored, all descending, then team name.
   */
  async standings(competition: string, season: number): Promise<StandingsRow[]> {
    const edges = await this.store.relationshipsTo('IN_SEASON', seasonKey(season, competition))
    const lines = new Map<string, RecordLine>()
    const lineOf = (team: string): RecordLine => {
      let line = lines.get(team)
      if (!line) {
        line = emptyLine()
        lines.set(team, line)
      }
      return line
    }

    for (const edge of edges) {
      const match = await this.store.getNode('match', edge.from)
      if (!match) continue
      addToLine(lineOf(match.homeTeam), match.homeGoals, match.awayGoals)
      addToLine(lineOf(match.awayTeam), match.awayGoals, match.homeGoals)
    }

    return [...lines.entries()]
      .sort(
        ([teamA, a], [teamB, b]) =>
          b.points - a.points ||
          b.goalDifference - a.goalDifference ||
          b.goalsFor - a.goalsFor ||
          teamA.localeCompare(teamB)
      )
      .map(([team, line], index) => ({ position: index + 1, team, ...line }))
  }

  /**
   * The team's latest matches, most recent first. Returns fewer than the
   * limit when the team has played fewer matches.
   */
  async recentForm(team: string, options: FormOptions = {}): Promise<FormEntry[]> {
    const limit = requirePositiveInteger(options.limit ?? DEFAULT_FORM_LIMIT, 'limit')
    const appearances = (await this.appearances(this.teamName(team)))
      .filter((appearance) => inScope(appearance.match, { competition: options.competition }))
      .sort((a, b) => byRecency(a.match, b.match))

    return appearances.slice(0, limit).map(({ match, venue, opponent, goalsFor, goalsAgainst, result }) => ({
      match: match.key,
      startTime: match.startTime,
      competition: match.competition,
      season: match.season,
      opponent,
      venue,
      goalsFor,
      goalsAgainst,
      result,
    }))
  }

  /**
   * Sums every home and away appearance of a team, with a breakdown per
   * competition.
   */
  async crossCompetitionTotals(team: string): Promise<CrossCompetitionTotals> {
    const name = this.teamName(team)
    const totals: CrossCompetitionTotals = {
      team: name,
      matches: 0,
      wins: 0,
      draws: 0,
      losses: 0,
      goalsFor: 0,
      goalsAgainst: 0,
      competitions: [],
    }
    const perCompetition = new Map<string, CompetitionTotals>()

    for (const appearance of await this.appearances(name)) {
      const competition = appearance.match.competition
      let entry = perCompetition.get(competition)
      if (!entry) {
        entry = { competition, matches: 0, wins: 0, draws: 0, losses: 0, goalsFor: 0, goalsAgainst: 0 }
        perCompetition.set(competition, entry)
      }
      for (const target of [totals, entry]) {
        target.matches++
        target.goalsFor += appearance.goalsFor
        target.goalsAgainst += appearance.goalsAgainst
        if (appearance.result === 'WIN') target.wins++
        else if (appearance.result === 'DRAW') target.draws++
        else target.losses++
      }
    }

    totals.competitions = [...perCompetition.values()].sort((a, b) =>
      a.competition.localeCompare(b.competition)
    )
    return totals
  }

  /**
   * Record of a team in its home matches only
   */
  async homeRecord(team: string, season?: number): Promise<TeamStatistics> {
    const name = this.teamName(team)
    const line = emptyLine()
    for (const appearance of await this.appearances(name)) {
      if (appearance.venue !== 'home') continue
      if (!inScope(appearance.match, { season })) continue
      addToLine(line, appearance.goalsFor, appearance.goalsAgainst)
    }
    return toStatistics(name, line)
  }

  /**
   * Teams ranked by goals scored in a season, ties by name
   */
  async topScoringTeams(
    season: number,
    limit: number = DEFAULT_RANKING_LIMIT,
    competition?: string
  ): Promise<ScoringRow[]> {
    requirePositiveInteger(limit, 'limit')
    const rows = new Map<string, ScoringRow>()
    const add = (team: string, goals: number): void => {
      const row = rows.get(team) ?? { team, goalsFor: 0, matches: 0 }
      row.goalsFor += goals
      row.matches++
      rows.set(team, row)
    }

    for (const match of await this.matches({ season, competition })) {
      add(match.homeTeam, match.homeGoals)
      add(match.awayTeam, match.awayGoals)
    }

    return [...rows.values()]
      .sort((a, b) => b.goalsFor - a.goalsFor || a.team.localeCompare(b.team))
      .slice(0, limit)
  }

  /**
   * Decided matches ranked by goal margin. Equal margins list the earlier
   * match first.
   */
  async biggestWins(competition?: string, limit: number = DEFAULT_RANKING_LIMIT): Promise<WinRecord[]> {
    requirePositiveInteger(limit, 'limit')
    const wins: WinRecord[] = []
    for (const match of await this.matches({ competition })) {
      if (match.homeGoals === match.awayGoals) continue
      const homeWon = match.homeGoals > match.awayGoals
      wins.push({
        match: match.key,
        startTime: match.startTime,
        competition: match.competition,
        season: match.season,
        winner: homeWon ? match.homeTeam : match.awayTeam,
        loser: homeWon ? match.awayTeam : match.homeTeam,
        winnerGoals: Math.max(match.homeGoals, match.awayGoals),
        loserGoals: Math.min(match.homeGoals, match.awayGoals),
        margin: Math.abs(match.homeGoals - match.awayGoals),
      })
    }

    return wins
      .sort(
        (a, b) =>
          b.margin - a.margin ||
          a.startTime.getTime() - b.startTime.getTime() ||
          a.match.localeCompare(b.match)
      )
      .slice(0, limit)
  }

  async averageGoalsPerMatch(competition?: string, season?: number): Promise<GoalAverage> {
    const matches = await this.matches({ competition, season })
    const goals = matches.reduce((sum, match) => sum + match.homeGoals + match.awayGoals, 0)
    return {
      matches: matches.length,
      goals,
      average: matches.length > 0 ? goals / matches.length : 0,
    }
  }

  /**
   * Every meeting of two teams, either side at home, oldest first
   */
  async findMatchesBetween(teamA: string, teamB: string): Promise<MatchNode[]> {
    const nameA = this.teamName(teamA)
    const nameB = this.teamName(teamB)
    const matches = [
      ...(await this.store.findNodes('match', { homeTeam: nameA, awayTeam: nameB })),
      ...(await this.store.findNodes('match', { homeTeam: nameB, awayTeam: nameA })),
    ]
    return matches.sort(byKickOff)
  }

  /**
   * Matches of one team, oldest first, optionally limited to its home or away
   * matches and to a season and competition
   */
  async findMatchesByTeam(team: string, filter: TeamMatchFilter = {}): Promise<MatchNode[]> {
    const name = this.teamName(team)
    const matches: MatchNode[] = []
    if (filter.venue !== 'away') {
      matches.push(...(await this.store.findNodes('match', { homeTeam: name })))
    }
    if (filter.venue !== 'home') {
      matches.push(...(await this.store.findNodes('match', { awayTeam: name })))
    }
    return matches.filter((match) => inScope(match, filter)).sort(byKickOff)
  }

  /**
   * Matches kicking off between `from` and `to`, both inclusive, oldest first
   *
   * @throws {InvalidParameterError} If `from` is after `to`
   */
  async findMatchesByDateRange(from: Date, to: Date): Promise<MatchNode[]> {
    if (from.getTime() > to.getTime()) {
      throw new InvalidParameterError('from', from, 'must not be after to')
    }
    const matches = await this.store.findNodes('match')
    return matches
      .filter((match) => {
        const time = match.startTime.getTime()
        return time >= from.getTime() && time <= to.getTime()
      })
      .sort(byKickOff)
  }

  async findMatchesByCompetition(competition: string): Promise<MatchNode[]> {
    const name = requireNonEmptyString(competition, 'competition')
    return (await this.store.findNodes('match', { competition: name })).sort(byKickOff)
  }

  async findMatchesBySeason(season: number): Promise<MatchNode[]> {
    return (await this.store.findNodes('match', { season })).sort(byKickOff)
  }

  async findPlayersByName(name: string): Promise<PlayerNode[]> {
    return this.store.searchByName('player', requireNonEmptyString(name, 'name'))
  }

  /**
   * Players whose nationality contains the text, ignoring case and accents
   */
  async findPlayersByNationality(nationality: string): Promise<PlayerNode[]> {
    const needle = foldName(requireNonEmptyString(nationality, 'nationality'))
    const players = await this.store.findNodes('player')
    return players.filter((player) => foldName(player.nationality).includes(needle))
  }

  /**
   * Current squad of a club, by the player → team affiliation
   */
  async findPlayersByClub(club: string): Promise<PlayerNode[]> {
    const edges = await this.store.relationshipsTo('BELONGS_TO', teamKey(this.teamName(club)))
    const players: PlayerNode[] = []
    for (const edge of edges) {
      const player = await this.store.getNode('player', edge.from)
      if (player) players.push(player)
    }
    return players.sort((a, b) => a.externalId - b.externalId)
  }

  /**
   * Players with an overall rating, best first; ties by name
   */
  async topRatedPlayers(limit: number = DEFAULT_RANKING_LIMIT): Promise<PlayerNode[]> {
    requirePositiveInteger(limit, 'limit')
    const rated: Array<{ player: PlayerNode; overall: number }> = []
    for (const player of await this.store.findNodes('player')) {
      if (player.overall !== undefined) rated.push({ player, overall: player.overall })
    }
    return rated
      .sort((a, b) => b.overall - a.overall || a.player.name.localeCompare(b.player.name))
      .slice(0, limit)
      .map(({ player }) => player)
  }

  /**
   * Teams whose canonical name, display name or any recorded alias contains
   * the text, ignoring case and accents
   */
  async searchTeams(text: string): Promise<TeamNode[]> {
    const needle = foldName(requireNonEmptyString(text, 'text'))
    const teams = await this.store.findNodes('team')
    return teams.filter((team) =>
      [team.name, team.displayName ?? '', ...team.aliases].some((candidate) =>
        foldName(candidate).includes(needle)
      )
    )
  }

  async searchStadiums(text: string): Promise<StadiumNode[]> {
    return this.store.searchByName('stadium', requireNonEmptyString(text, 'text'))
  }

  private teamName(raw: string): string {
    return this.resolver.canonical(requireNonEmptyString(raw, 'team'))
  }

  private async matches(scope: StatisticsScope): Promise<MatchNode[]> {
    const filter = scope.season !== undefined ? { season: scope.season } : undefined
    const matches = await this.store.findNodes('match', filter)
    return matches.filter((match) => inScope(match, scope))
  }

  /**
   * Every match of a team, read through its home and away relationships.
   * Goals and result come from the relationship.
   */
  private async appearances(team: string): Promise<Appearance[]> {
    const key = teamKey(team)
    const appearances: Appearance[] = []
    const sides = [
      ['home', await this.store.relationshipsFrom('PLAYED_HOME', key)],
      ['away', await this.store.relationshipsFrom('PLAYED_AWAY', key)],
    ] as const

    for (const [venue, edges] of sides) {
      for (const edge of edges) {
        const match = await this.store.getNode('match', edge.to)
        if (!match) continue
        appearances.push({
          match,
          venue,
          opponent: venue === 'home' ? match.awayTeam : match.homeTeam,
          goalsFor: edge.properties.goalsScored,
          goalsAgainst: edge.properties.goalsConceded,
          result: edge.properties.result,
        })
      }
    }
    return appearances
  }
}
