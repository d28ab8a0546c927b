import XRegExp from 'xregexp'

import { mask, unmask, hasReserved, Placeholder, WrappedPlaceholder } from './grouping'
import { tokenize, Separators } from './tokenizer'
import { isFragile, Rules, FragilityRules } from './fragile'
import { SubscriptPeriod, Tables } from './tables'
import { merge } from './merge'

export type Options = {
  /** characters that separate words, defaults to `Separators` */
  separators?: string
  rules?: Partial<FragilityRules>
  trace?: (message: string) => void
}

// eslint-disable-next-line @typescript-eslint/no-empty-function
function silent(_message: string): void {}

/**
 * Wraps every word of `title` whose capitals a bibliography style would lowercase in braces, leaving everything else untouched.
 *
 * Brace groups and `$…$` math are kept intact; math that contains a capital is braced as a whole. A period between two
 * subscript digits comes back as `SubscriptPeriod`, which `escape` turns into a period again. Titles that already contain
 * one of the reserved private-use characters are returned as is.
 */
export function protect(title: string, options: Options = {}): string {
  const trace = options.trace || silent
  if (!title) return title
  if (hasReserved(title)) {
    trace(`Reserved character in title, not protected: ${title}`)
    return title
  }

  const separators = options.separators ?? Separators
  const rules = merge<FragilityRules>(options.rules ?? {}, Rules)

  const { masked, groups } = mask(title.replace(Tables.ranges.subscriptPeriod, SubscriptPeriod), { protectMath: true })
  groups.forEach((group, i) => trace(`Group: ${i + 1} = ${group}`))

  const tokens = tokenize(masked, separators)
  const protectedTitle = tokens.map((token, i) => {
    if (!isFragile(token, i ? tokens[i - 1] : null, rules)) return token

    trace(`Protect: ${unmask(token, groups)}`)
    return `{${token.split(Placeholder).join(WrappedPlaceholder)}}`
  })

  return unmask(protectedTitle.join(''), groups)
}

// opening quotes and brackets, and accent commands with their group (`{\"a}`), but not the braces of a protected word
const Subtitle = XRegExp(String.raw`(: (?:["'\x60(\[]|\{(?=\\)|\\[^A-Za-z\s])*)(\p{Ll})`, 'g')

/**
 * Capitalizes the first letter after a `": "` so the subtitle starts like a sentence.
 */
export function capitalizeSubtitles(title: string): string {
  return title.replace(Subtitle, (match: string, lead: string, letter: string) => `${lead}${letter.toUpperCase()}`)
}
