import { Tables, SubscriptPeriod } from './tables'
import { merge } from './merge'

import * as rx from './re'

export type Options = {
  /** markup for a run of superscript characters, `X` stands for the run */
  sup?: string
  /** markup for a run of subscript characters, `X` stands for the run */
  sub?: string
}

function template(format: string): (match: string, run: string) => string {
  return (match, run) => format.split('X').join(run)
}

/**
 * Rewrites the Unicode in `s` as LaTeX: super- and subscript runs through their templates, runs of math symbols as `$…$`, and
 * accented letters, special spaces, quotes and a few reserved characters as their commands.
 */
export function escape(s: string, options: Options = {}): string {
  const { sup, sub } = merge<Required<Options>>(options, { sup: '\\textsuperscript{X}', sub: '\\textsubscript{X}' })

  s = s
    .replace(Tables.ranges.superscript, template(sup))
    .replace(Tables.ranges.subscript, template(sub))
    .replace(Tables.ranges.math, (match: string, run: string) => `$${run}$`)
    .split(SubscriptPeriod).join('.')

  for (const table of [Tables.accents, Tables.spaces, Tables.quotes, Tables.superscripts, Tables.subscripts, Tables.math, Tables.others]) {
    for (const [c, tex] of table) {
      s = s.split(c).join(tex)
    }
  }

  return s
    .replace(/\{(\d)\}/g, '$1')
    .replace(/_\{(\w)\}/g, '_$1')
    .replace(/\$[^$]+\$/g, math => math.replace(/\\ensuremath/g, ''))
    .replace(/ = /g, '~=~')
    .replace(/ {2,}/g, ' ')
}

/**
 * The distinct characters outside ASCII that `s` still contains.
 */
export function unescaped(s: string): string[] {
  return [...new Set(s.match(rx.NonASCII) || [])]
}
