/**
 * Header contracts for the six raw datasets
 * @module sources/row-schemas
 */

import { z } from 'zod'

/**
 * One raw tabular row: header name to cell text
 */
export type RawRow = Record<string, string | undefined>

const requiredText = z
  .string({ required_error: 'is required' })
  .trim()
  .min(1, 'must not be empty')

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value))

export const matchRowSchema = z.object({
  datetime: requiredText,
  home_team: requiredText,
  away_team: requiredText,
  home_team_state: optionalText,
  away_team_state: optionalText,
  season: requiredText,
  round: optionalText,
  home_goal: requiredText,
  away_goal: requiredText,
  arena: optionalText,
  match_id: optionalText,
})

export const internationalMatchRowSchema = matchRowSchema.extend({
  stage: optionalText,
})

export const extendedStatsRowSchema = z.object({
  date: requiredText,
  time: optionalText,
  home_team: requiredText,
  away_team: requiredText,
  home_corner: optionalText,
  away_corner: optionalText,
  home_attack: optionalText,
  away_attack: optionalText,
  home_shots: optionalText,
  away_shots: optionalText,
})

export const archiveRowSchema = z.object({
  match_id: optionalText,
  season: optionalText,
  round: optionalText,
  home_team: optionalText,
  away_team: optionalText,
  stadium: requiredText,
  city: optionalText,
  state: optionalText,
  capacity: optionalText,
})

export const playerRowSchema = z.object({
  id: requiredText,
  name: requiredText,
  nationality: requiredText,
  age: optionalText,
  position: optionalText,
  overall: optionalText,
  potential: optionalText,
  club: optionalText,
  wage: optionalText,
  jersey_number: optionalText,
  contract_year: optionalText,
  joined: optionalText,
})

export type MatchRow = z.infer<typeof matchRowSchema>
export type InternationalMatchRow = z.infer<typeof internationalMatchRowSchema>
export type ExtendedStatsRow = z.infer<typeof extendedStatsRowSchema>
export type ArchiveRow = z.infer<typeof archiveRowSchema>
export type PlayerRow = z.infer<typeof playerRowSchema>
