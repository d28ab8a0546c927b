import data from './tables.json'

import * as rx from './re'

export type Substitutions = ReadonlyMap<string, string>

/**
 * Stands in for a period between two subscript digits (as in `₂.₅`) so the title tokenizer does not split there. Turned back into a period by `escape`.
 */
export const SubscriptPeriod = '\uE002'

function substitutions(...tables: Record<string, string>[]): Substitutions {
  return new Map(tables.flatMap(table => Object.entries(table)))
}

function symbols(list: string[]): ReadonlySet<string> {
  return new Set(list)
}

const superscripts = substitutions(data.superscripts)
const subscripts = substitutions(data.subscripts)
const math = substitutions(data.math)
const accents = substitutions(data.accents, data.dashes)

const simplifications: Substitutions = new Map([...accents].map(([c, tex]): [string, string] => [c, tex.replace(/}/g, '').slice(-1)]))

const sup = rx.match(superscripts.keys())
const sub = rx.match(subscripts.keys())
const subRun = `[${rx.chars(subscripts.keys())}.,${SubscriptPeriod}]`
const op = rx.match(math.keys())
const operand = `[${rx.chars(math.keys())}\\d]`
const spaced = `[${rx.chars(math.keys())}\\d\\sx]`

export const Tables = {
  /** accented letters, typographic quotes and dashes */
  accents,
  spaces: substitutions(data.spaces),
  quotes: substitutions(data.quotes),
  superscripts,
  subscripts,
  math,
  others: substitutions(data.others),

  /** the plain letter each accented character reduces to in citation keys */
  simplifications,

  names: symbols(data.names),
  elements: symbols(data.elements.filter(symbol => !data.ambiguousElements.includes(symbol))),

  ranges: {
    superscript: new RegExp(`(${sup}+)`, 'g'),
    subscript: new RegExp(`(${sub}+(?:${subRun}+${sub})?)`, 'g'),
    math: new RegExp(`((?:${operand}${spaced}*)?${op}+(?:${spaced}*${operand})?)`, 'g'),
    subscriptPeriod: /(?<=[₀-₉])\.(?=[₀-₉])/g,
  },
}
