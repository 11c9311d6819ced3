export { AliasResolver, createTeamResolver, createStadiumResolver } from './alias-resolver.js'
export type { Resolution, AliasResolverOptions } from './alias-resolver.js'
export {
  AliasTable,
  REGION_CODES,
  aliasEntrySchema,
  aliasFileSchema,
  splitRegionSuffix,
  loadAliasTable,
  loadTeamAliases,
  loadStadiumAliases,
} from './alias-table.js'
export type { AliasEntry } from './alias-table.js'
export { MemoCache } from './memo-cache.js'
export type { MemoCacheStats } from './memo-cache.js'
