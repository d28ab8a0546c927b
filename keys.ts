import { Tables } from './tables'

import * as rx from './re'

/**
 * Reduces an author's surname to the ASCII letters used in citation keys: `M\"uller` and `Müller` both become `Muller`.
 */
export function simplify(name: string): string {
  name = name.replace(/\\\w+/g, '')
  for (const [c, plain] of Tables.simplifications) {
    name = name.split(c).join(plain)
  }
  return name.normalize('NFD').replace(rx.Mark, '').replace(/[^A-Za-z]/g, '')
}

export type KeyFields = {
  /** authors, `Last, First and Last, First` */
  AU?: string
  /** publication year */
  PY?: string
}

/**
 * First author's surname followed by the year: `XXXX` when the year is unknown, or its last two digits (`XX`) with `shortYear`.
 */
export function citationKey(fields: KeyFields, shortYear = false): string {
  const surname = simplify((fields.AU ?? 'Unknown').split(',')[0])
  return surname + (shortYear ? (fields.PY ?? 'XX').slice(-2) : fields.PY ?? 'XXXX')
}

/**
 * The number formed by all the ASCII digits in `s`, 0 if it has none.
 */
export function parseDigits(s = ''): number {
  const digits = s.replace(/[^0-9]/g, '')
  return digits ? parseInt(digits, 10) : 0
}

export type SortKey = (string | number)[]

export function compare(a: SortKey, b: SortKey): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    if (a[i] === b[i]) continue
    if (typeof a[i] === 'number' && typeof b[i] === 'number') return Number(a[i]) - Number(b[i])
    return String(a[i]) < String(b[i]) ? -1 : 1
  }
  return a.length - b.length
}

/**
 * Suffix for the `n`th (counting from 0) of several entries that share a key: `a` … `z`, then `aa`, `ab` and so on.
 * With `skipA` the first entry keeps its bare key.
 */
export function sublabel(n: number, skipA = false): string {
  if (n === 0 && skipA) return ''

  let label = ''
  let i = n + 1
  while (i > 0) {
    i--
    label = String.fromCharCode('a'.charCodeAt(0) + i % 26) + label // eslint-disable-line no-magic-numbers
    i = Math.floor(i / 26) // eslint-disable-line no-magic-numbers
  }
  return label
}
