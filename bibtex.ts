/**
 * RIS tags a BibTeX entry is built from. Besides the RIS tags themselves, `HP` holds `howpublished`, `AP` the eprint
 * archive and `AR` the eprint identifier.
 */
export type Tag = 'AU' | 'TI' | 'J2' | 'VL' | 'SP' | 'PY' | 'ET' | 'PB' | 'CY' | 'Y2' | 'A2' | 'M3' | 'HP' | 'UR' | 'DO' | 'AP' | 'AR' | 'DA' | 'T2'

export type EntryType = 'article' | 'unpublished' | 'book' | 'electronic' | 'incollection' | 'phdthesis' | 'misc' | 'techreport'

export type Fields = Partial<Record<Tag, string>>

export type Entry = {
  input: string
  type: EntryType
  key: string
  fields: Fields
}

type Layout = [string, Tag][]

const links: Layout = [
  ['url', 'UR'],
  ['doi', 'DO'],
  ['archiveprefix', 'AP'],
  ['eprint', 'AR'],
]

/** BibTeX fields written for each entry type, in output order */
export const Layouts: Record<EntryType, Layout> = {
  article: [
    ['author', 'AU'],
    ['title', 'TI'],
    ['journal', 'J2'],
    ['volume', 'VL'],
    ['pages', 'SP'],
    ['year', 'PY'],
    ...links,
  ],
  unpublished: [
    ['author', 'AU'],
    ['title', 'TI'],
    ['year', 'PY'],
    ...links,
  ],
  book: [
    ['author', 'AU'],
    ['title', 'TI'],
    ['edition', 'ET'],
    ['publisher', 'PB'],
    ['address', 'CY'],
    ['year', 'PY'],
    ...links,
  ],
  electronic: [
    ['author', 'AU'],
    ['title', 'TI'],
    ['urldate', 'Y2'],
    ...links,
  ],
  incollection: [
    ['author', 'AU'],
    ['title', 'TI'],
    ['editor', 'A2'],
    ['booktitle', 'J2'],
    ['volume', 'VL'],
    ['edition', 'ET'],
    ['publisher', 'PB'],
    ['address', 'CY'],
    ['year', 'PY'],
    ...links,
  ],
  phdthesis: [
    ['author', 'AU'],
    ['title', 'TI'],
    ['type', 'M3'],
    ['school', 'PB'],
    ['year', 'PY'],
    ...links,
  ],
  misc: [
    ['author', 'AU'],
    ['title', 'TI'],
    ['howpublished', 'HP'],
    ['year', 'PY'],
    ...links,
  ],
  techreport: [
    ['author', 'AU'],
    ['title', 'TI'],
    ['institution', 'PB'],
    ['year', 'PY'],
    ...links,
  ],
}

/**
 * Formats one entry, field names right-aligned to the longest name present:
 *
 * ```
 * @article{Einstein1905,
 *  author = {Einstein, A.},
 *   title = {Zur Elektrodynamik bewegter K\"orper},
 * journal = {Ann. Phys.},
 * }
 * ```
 */
export function format(entry: Entry): string {
  const lines: [string, string][] = []
  for (const [name, tag] of Layouts[entry.type]) {
    const value = entry.fields[tag]
    if (typeof value === 'string') lines.push([name, value])
  }

  const width = Math.max(0, ...lines.map(([name]) => name.length))
  return [
    `@${entry.type}{${entry.key},\n`,
    ...lines.map(([name, value]) => `${name.padStart(width)} = {${value}},\n`),
    '}\n',
  ].join('')
}

export function write(entries: Entry[]): string {
  return entries.map(format).join('')
}
