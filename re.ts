import XRegExp from 'xregexp'

/**
 * Escapes the characters that are special inside a regular expression character class.
 */
export function chars(list: Iterable<string>): string {
  return Array.from(list, c => c.replace(/[\\\]\[^-]/g, '\\$&')).join('')
}

export function match(list: Iterable<string>, neg = false): string {
  return `[${neg ? '^' : ''}${chars(list)}]`
}

// combining marks left behind by canonical decomposition
export const Mark: RegExp = XRegExp('\\p{M}', 'g')

export const NonASCII: RegExp = XRegExp('\\P{ASCII}', 'g')
