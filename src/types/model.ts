/**
 * Canonical model: the six entity kinds and seven relationship kinds of the
 * unified store.
 * @module types/model
 */

/**
 * Outcome of a match from one side's perspective
 */
export type MatchResult = 'WIN' | 'DRAW' | 'LOSS'

/**
 * Competition classification
 */
export type CompetitionType = 'league' | 'cup' | 'international'

export const COMPETITION_TYPES: readonly CompetitionType[] = [
  'league',
  'cup',
  'international',
]

/**
 * Stage of an international cup match
 */
export type MatchStage = 'group' | 'knockout'

/**
 * Extended counters for one side of a match
 */
export interface SideStats {
  shots?: number
  corners?: number
  attacks?: number
}

/**
 * Extended statistics for both sides of a match
 */
export interface MatchStats {
  home: SideStats
  away: SideStats
}

/**
 * Fields shared by every stored entity
 */
export interface BaseNode {
  /** Identity key, unique within the entity kind */
  key: string

  /** Set once on creation, never mutated */
  createdAt: Date
}

export interface TeamNode extends BaseNode {
  /** Canonical name (identity) */
  name: string
  displayName?: string
  /** Two-letter region code */
  region?: string
  /** Raw spellings that resolved to this team */
  aliases: string[]
}

export interface PlayerNode extends BaseNode {
  externalId: number
  name: string
  nationality: string
  age?: number
  position?: string
  overall?: number
  potential?: number
  /** Canonical name of the current club */
  club?: string
  wage?: number
  jerseyNumber?: number
  contractYear?: number
}

export interface MatchNode extends BaseNode {
  startTime: Date
  homeTeam: string
  awayTeam: string
  homeGoals: number
  awayGoals: number
  season: number
  competition: string
  round?: string
  stage?: MatchStage
  externalId?: string
  stats?: MatchStats
}

export interface CompetitionNode extends BaseNode {
  name: string
  country?: string
  type?: CompetitionType
}

export interface SeasonNode extends BaseNode {
  year: number
  competition: string
}

export interface StadiumNode extends BaseNode {
  name: string
  city?: string
  region?: string
  capacity?: number
}

/**
 * Node kind to node shape
 */
export interface NodeTypes {
  team: TeamNode
  player: PlayerNode
  match: MatchNode
  competition: CompetitionNode
  season: SeasonNode
  stadium: StadiumNode
}

export type NodeKind = keyof NodeTypes

export const NODE_KINDS: readonly NodeKind[] = [
  'team',
  'player',
  'match',
  'competition',
  'season',
  'stadium',
]

/**
 * Attributes of a node without its identity and creation timestamp
 */
export type NodeAttributes<K extends NodeKind> = Omit<NodeTypes[K], 'key' | 'createdAt'>

/**
 * Team → Match edge attributes (home or away side)
 */
export interface PlayedProperties {
  goalsScored: number
  goalsConceded: number
  result: MatchResult
  shots?: number
  corners?: number
  attacks?: number
}

/**
 * Player → Team edge attributes
 */
export interface BelongsToProperties {
  jerseyNumber?: number
  joinedAt?: Date
  contractYear?: number
  wage?: number
}

/**
 * Team → Competition edge attributes
 */
export interface CompetesInProperties {
  season: number
}

/**
 * Relationship type to endpoint kinds and edge attributes
 */
export interface RelationshipTypes {
  PLAYED_HOME: { from: 'team'; to: 'match'; properties: PlayedProperties }
  PLAYED_AWAY: { from: 'team'; to: 'match'; properties: PlayedProperties }
  BELONGS_TO: { from: 'player'; to: 'team'; properties: BelongsToProperties }
  HOSTED_AT: { from: 'match'; to: 'stadium'; properties: Record<string, never> }
  IN_COMPETITION: { from: 'match'; to: 'competition'; properties: Record<string, never> }
  IN_SEASON: { from: 'match'; to: 'season'; properties: Record<string, never> }
  COMPETES_IN: { from: 'team'; to: 'competition'; properties: CompetesInProperties }
}

export type RelationshipType = keyof RelationshipTypes

export const RELATIONSHIP_TYPES: readonly RelationshipType[] = [
  'PLAYED_HOME',
  'PLAYED_AWAY',
  'BELONGS_TO',
  'HOSTED_AT',
  'IN_COMPETITION',
  'IN_SEASON',
  'COMPETES_IN',
]

/**
 * Endpoint kinds for each relationship type, available at runtime
 */
export const RELATIONSHIP_ENDPOINTS: {
  [R in RelationshipType]: { from: RelationshipTypes[R]['from']; to: RelationshipTypes[R]['to'] }
} = {
  PLAYED_HOME: { from: 'team', to: 'match' },
  PLAYED_AWAY: { from: 'team', to: 'match' },
  BELONGS_TO: { from: 'player', to: 'team' },
  HOSTED_AT: { from: 'match', to: 'stadium' },
  IN_COMPETITION: { from: 'match', to: 'competition' },
  IN_SEASON: { from: 'match', to: 'season' },
  COMPETES_IN: { from: 'team', to: 'competition' },
}

/**
 * A stored relationship between two identity keys
 */
export interface Relationship<R extends RelationshipType = RelationshipType> {
  type: R
  /** Identity key of the source node */
  from: string
  /** Identity key of the target node */
  to: string
  /** Attribute distinguishing parallel edges (season for COMPETES_IN) */
  discriminator?: string
  properties: RelationshipTypes[R]['properties']
  createdAt: Date
}
