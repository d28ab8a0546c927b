import { Tables } from './tables'

/**
 * How a token is matched against a surname:
 * - `prefix`: any token that starts with the name (`Gaussian`, `Fermions`)
 * - `exempt-suffixes`: as `prefix`, except when the rest of the token is an `-ion`/`-on`/`-ons` ending (`Fermions` is not protected)
 */
export type EponymMatching = 'prefix' | 'exempt-suffixes'

export interface FragilityRules {
  /** surnames that stay capitalized, also as the start of a derived word */
  names: ReadonlySet<string>
  /** chemical element symbols */
  elements: ReadonlySet<string>
  /** single capitals that are ordinary words */
  words: ReadonlySet<string>
  eponyms: EponymMatching
  /** ending that keeps a derived word from matching under `exempt-suffixes` */
  exemptSuffix: RegExp
  /** shorter names only match whole tokens */
  minimumPrefix: number
}

export const Rules: FragilityRules = {
  names: Tables.names,
  elements: Tables.elements,
  words: new Set(['A']),
  eponyms: 'exempt-suffixes',
  exemptSuffix: /^i?ons?$/,
  minimumPrefix: 4,
}

function eponym(token: string, name: string, rules: FragilityRules): boolean {
  if (token === name) return true
  if (name.length < rules.minimumPrefix || !token.startsWith(name)) return false
  return rules.eponyms === 'prefix' || !rules.exemptSuffix.test(token.slice(name.length))
}

/**
 * Decides whether the capitals in `token` would be lost when a bibliography style lowercases the title.
 *
 * @param previous - the separator run before the token, `null` for the first token of the title
 */
export function isFragile(token: string, previous: string | null, rules: FragilityRules = Rules): boolean {
  const upper = token.search(/[A-Z]/)
  if (upper < 0) return false

  // NaCl, W90, 2D
  if ((token.match(/[A-Z0-9]/g) || []).length > 1) return true

  // eV
  const lower = token.search(/[a-z]/)
  if (lower >= 0 && lower < upper) return true

  // the first word keeps its capital in any style
  if (previous === null) return false
  // so does the first word of a subtitle
  if (previous === ': ') return false

  if (token.length === 1 && !rules.words.has(token)) return true

  for (const name of rules.names) {
    if (eponym(token, name, rules)) return true
  }

  if (rules.elements.has(token.replace(/[^A-Za-z]/g, ''))) return true

  // after an abbreviation
  return previous.includes('.')
}
