/**
 * String normalizer signature. Normalizers are pure and never throw.
 */
export type StringNormalizer = (value: string) => string

/**
 * Converts a string to uppercase.
 *
 * @example
 * ```typescript
 * uppercase('Grêmio') // 'GRÊMIO'
 * ```
 */
export const uppercase: StringNormalizer = (value) => value.toUpperCase()

/**
 * Collapses runs of whitespace into a single space and trims both ends.
 *
 * @example
 * ```typescript
 * normalizeWhitespace('  Vasco   da  Gama ') // 'Vasco da Gama'
 * normalizeWhitespace('São\n\nPaulo') // 'São Paulo'
 * ```
 */
export const normalizeWhitespace: StringNormalizer = (value) =>
  value.trim().replace(/\s+/g, ' ')

/**
 * Removes combining diacritical marks after canonical decomposition.
 *
 * @example
 * ```typescript
 * stripDiacritics('Grêmio') // 'Gremio'
 * stripDiacritics('Avaí') // 'Avai'
 * stripDiacritics('Maracanã') // 'Maracana'
 * ```
 */
export const stripDiacritics: StringNormalizer = (value) =>
  value.normalize('NFD').replace(/\p{M}+/gu, '').normalize('NFC')

/**
 * Applies normalizers left to right.
 *
 * @example
 * ```typescript
 * const fold = composeNormalizers(normalizeWhitespace, uppercase)
 * fold('  vila   belmiro ') // 'VILA BELMIRO'
 * ```
 */
export function composeNormalizers(
  ...normalizers: StringNormalizer[]
): StringNormalizer {
  return (value) => normalizers.reduce((result, fn) => fn(result), value)
}

/**
 * Comparison form of a name: diacritics removed, uppercased, whitespace
 * collapsed. Used only for lookups and containment tests, never stored.
 *
 * @example
 * ```typescript
 * foldName(' grêmio  fbpa ') // 'GREMIO FBPA'
 * foldName('Gremio FBPA') // 'GREMIO FBPA'
 * ```
 */
export const foldName: StringNormalizer = composeNormalizers(
  stripDiacritics,
  uppercase,
  normalizeWhitespace
)
