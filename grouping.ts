import { SubscriptPeriod } from './tables'

/** Marks a masked group in the masked string. */
export const Placeholder = '\uE000'
/** Marks a masked group inside a token that has since been wrapped in braces. */
export const WrappedPlaceholder = '\uE001'

// a placeholder is its marker followed by a fixed-width index, one base-256 digit per character
const IndexBase = 0xE100
const IndexDigit = 0x100
const IndexWidth = 2
export const MaxGroups = IndexDigit ** IndexWidth - 1

const Reserved = new RegExp(`[${Placeholder}${WrappedPlaceholder}${SubscriptPeriod}\uE100-\uE1FF]`)

export type Masked = {
  masked: string
  /** group `n` (counting from 1) replaces placeholder `n` */
  groups: string[]
}

export type Options = {
  /** wrap math spans that contain an uppercase letter in braces before storing them */
  protectMath?: boolean
}

export function hasReserved(s: string): boolean {
  return Reserved.test(s)
}

export function placeholder(n: number, marker = Placeholder): string {
  return marker + String.fromCharCode(IndexBase + Math.floor(n / IndexDigit), IndexBase + n % IndexDigit)
}

/**
 * Replaces brace groups, innermost first, and then `$…$` math spans by placeholders, so the tokenizer sees each of them as part of a single word.
 */
export function mask(s: string, options: Options = {}): Masked {
  const groups: string[] = []
  const store = (group: string): string => {
    if (groups.length === MaxGroups) return group
    groups.push(group)
    return placeholder(groups.length)
  }

  let unnested: string
  do {
    unnested = s
    s = s.replace(/\{[^{}]*\}/g, store)
  } while (s !== unnested)

  s = s.replace(/\$[^$]+\$/g, math => store(options.protectMath && /[A-Z]/.test(unmask(math, groups)) ? `{${math}}` : math))

  return { masked: s, groups }
}

// braces around math were added by `mask`, and the token around it already protects it
function unwrap(group: string): string {
  return group.match(/^\{(\$[^$]+\$)\}$/)?.[1] ?? group
}

export function unmask(s: string, groups: string[]): string {
  for (let n = groups.length; n > 0; n--) {
    const group = groups[n - 1]
    s = s.split(placeholder(n)).join(group).split(placeholder(n, WrappedPlaceholder)).join(unwrap(group))
  }
  return s
}
