import { Entry, EntryType, Fields, Layouts, Tag } from './bibtex'
import { ParsingError, ParseError } from './errors'
import { escape, unescaped } from './escape'
import { citationKey, compare, parseDigits, sublabel, SortKey } from './keys'
import { merge } from './merge'
import { protect, capitalizeSubtitles, Options as ProtectionOptions } from './protect'
import { Tables } from './tables'

export interface ParserOptions {
  /** markup for superscripts, `X` stands for the superscript text */
  sup?: string
  /** markup for subscripts, `X` stands for the subscript text */
  sub?: string
  /** capitalize the first letter after `": "` in titles, defaults to `true` */
  subtitleCapitalization?: boolean
  /** write en dashes between words (not numbers) as hyphens */
  nodash?: boolean
  /** two-digit years in citation keys */
  shortYear?: boolean
  /** no `a` suffix on the first of several entries with the same key */
  skipA?: boolean
  /** keep the eprint of published works, defaults to `true` */
  arxiv?: boolean
  /** DOIs and eprints as URLs, for Nature-style bibliographies */
  nature?: boolean
  /** eprints as full URLs and `misc` instead of `unpublished`, for SciPost-style bibliographies */
  scipost?: boolean
  /**
   * list only the first author ("and others") when there are more than `etal`; 0 lists everyone
   */
  etal?: number
  /** how titles are protected */
  protection?: ProtectionOptions
  /** receives progress messages: protected words, generated sublabels, guessed entry types */
  trace?: (message: string) => void
}

type Block = {
  /** line number of the first line, counting from 1 */
  line: number
  lines: string[]
}

type Draft = {
  type?: EntryType
  fields: Fields
}

const Types: Partial<Record<string, EntryType>> = {
  JOUR: 'article',
  BOOK: 'book',
  ELEC: 'electronic',
  CHAP: 'incollection',
  THES: 'phdthesis',
  COMP: 'misc',
  RPRT: 'techreport',
}

const Theses: Partial<Record<string, string>> = {
  b: "Bachelor's thesis",
  m: "Master's thesis",
  d: 'Dissertation',
  // Ph.D. thesis is what `phdthesis` means without a type
}

// the date orders entries of the same year, the long journal name stands in for a missing short one
const tags: Set<string> = new Set([...Object.values(Layouts).flat().map(([, tag]) => tag), 'DA', 'T2'])
function isTag(tag: string): tag is Tag {
  return tags.has(tag)
}

// identifiers and links are copied as is
const verbatim: Set<Tag> = new Set(['AR', 'DO', 'UR'])

// eslint-disable-next-line @typescript-eslint/no-empty-function
function silent(_message: string): void {}

export class Library {
  public entries: Entry[] = []
  public errors: ParseError[] = []

  private options: Required<ParserOptions>
  private lines: string[]

  constructor(input: string, options: ParserOptions = {}) {
    this.options = merge<Required<ParserOptions>>(options, {
      sup: '\\textsuperscript{X}',
      sub: '\\textsubscript{X}',
      subtitleCapitalization: true,
      nodash: false,
      shortYear: false,
      skipA: false,
      arxiv: true,
      nature: false,
      scipost: false,
      etal: 0,
      protection: {},
      trace: silent,
    })

    this.lines = input.replace(/^\uFEFF/, '').split(/\r?\n/)
  }

  public parse(): void {
    let start = 0
    for (let i = 0; i <= this.lines.length; i++) {
      if (i === this.lines.length || /^ER\s*-/.test(this.lines[i])) {
        this.block({ line: start + 1, lines: this.lines.slice(start, i) })
        start = i + 1
      }
    }

    this.sort()
  }

  private error(message: string, block: Block): void {
    this.errors.push({ error: `${message} in record at line ${block.line}`, input: block.lines.join('\n') })
  }

  private block(block: Block): void {
    const draft = this.read(block)
    if (!draft) return

    try {
      this.entries.push(this.entry(draft, block))
    }
    catch (err) {
      if (!(err instanceof ParsingError)) throw err
      this.errors.push({ error: err.message, input: block.lines.join('\n') })
    }
  }

  private read(block: Block): Draft | undefined {
    const draft: Draft = { fields: {} }

    for (const line of block.lines) {
      const m = line.match(/^([A-Z][A-Z0-9])\s*-\s*(.*?)\s*$/)
      if (!m) continue

      const [, tag, value] = m
      if (tag === 'TY') {
        draft.type = Types[value] ?? draft.type
      }
      else if ((tag === 'AU' || tag === 'A2') && typeof draft.fields[tag] === 'string') {
        draft.fields[tag] += ` and ${value}`
      }
      else if (tag === 'UR' || tag.match(/^L\d$/)) {
        this.link(draft, tag, value, block)
      }
      else if (isTag(tag)) {
        draft.fields[tag] = value
      }
    }

    return (draft.type || Object.keys(draft.fields).length) ? draft : undefined
  }

  private link(draft: Draft, tag: string, url: string, block: Block): void {
    const fields = draft.fields
    if (tag === 'UR') fields.UR = url

    if (typeof fields.AR !== 'string' && url.match(/arxiv/i)) {
      const eprint = url.match(/(?:abs|pdf)\/(.+?)(?:v\d+)?(?:\.pdf|$)/)
      if (eprint) {
        fields.AP = 'arXiv'
        fields.AR = eprint[1]
      }
      else {
        this.error(`No arXiv identifier in ${url}`, block)
      }
    }

    if (typeof fields.DO !== 'string' && url.match(/doi\.org/i)) {
      const doi = url.match(/doi\.org\/(.+?)\/?$/i)
      if (doi) {
        fields.DO = doi[1]
      }
      else {
        this.error(`No DOI in ${url}`, block)
      }
    }

    if (url.match(/archive\.materialscloud\.org/i)) {
      const record = url.match(/record\/(.+?)\/?$/)?.[1].split('.') ?? []
      if (record.length === 2) {
        draft.type = 'article'
        fields.J2 = 'Materials Cloud Archive'
        fields.VL = record[0]
        fields.SP = record[1]
      }
      else {
        this.error(`No Materials Cloud Archive record number in ${url}`, block)
      }
    }
  }

  private entry(draft: Draft, block: Block): Entry {
    const { trace, protection } = this.options
    const fields: Fields = { ...draft.fields }
    let type = draft.type

    if (typeof fields.TI !== 'string') throw new ParsingError('Missing title', `record at line ${block.line}`)

    const key = citationKey(fields, this.options.shortYear)

    fields.TI = protect(fields.TI, { ...protection, trace: protection.trace ?? trace })
    if (this.options.subtitleCapitalization) fields.TI = capitalizeSubtitles(fields.TI)

    for (const tag of ['AU', 'A2'] as const) {
      let names = fields[tag]
      if (typeof names !== 'string') continue
      for (const space of Tables.spaces.keys()) {
        names = names.split(space).join(' ')
      }
      fields[tag] = names
    }

    if (this.options.etal > 0 && typeof fields.AU === 'string') {
      const authors = fields.AU.split(' and ')
      if (authors.length > this.options.etal) fields.AU = `${authors[0]} and others`
    }

    if (typeof fields.M3 === 'string') {
      const thesis = Theses[fields.M3.charAt(0).toLowerCase()]
      if (thesis) {
        fields.M3 = thesis
      }
      else {
        delete fields.M3
      }
    }

    for (const tag of Object.keys(fields).filter(isTag)) {
      const value = fields[tag]
      if (typeof value !== 'string' || verbatim.has(tag)) continue

      let escaped = escape(value, { sup: this.options.sup, sub: this.options.sub })
      if (this.options.nodash) escaped = escaped.replace(/(?<![\d-])--(?![\d-])/g, '-')
      for (const c of unescaped(escaped)) {
        trace(`Unescaped character in ${key}: ${c}`)
      }
      fields[tag] = escaped
    }

    // unknown parts of a date sort after known ones
    if (typeof fields.DA === 'string') fields.DA = fields.DA.split('/').join('\\')

    if (typeof fields.J2 !== 'string' && typeof fields.T2 === 'string') {
      fields.J2 = fields.T2
      delete fields.T2
    }

    // preprints cited by their arXiv journal string, e.g. "arXiv:2101.00001 [cond-mat.str-el]"
    if (fields.J2?.startsWith('arXiv')) {
      type = 'unpublished'
      const eprint = fields.J2.split(/\s+/)[0].split(':')[1]
      if (eprint) {
        fields.AP = 'arXiv'
        fields.AR = eprint
      }
      else {
        this.error(`No arXiv identifier in journal ${fields.J2}`, block)
      }
      delete fields.J2
    }

    if (fields.PB === 'arXiv') type = 'unpublished'

    if (type === 'misc' && typeof fields.UR === 'string') {
      fields.HP = fields.UR.match(/zenodo/i) ? 'Zenodo' : fields.UR.replace(/^.*?\/\//, '').split('/').join('/\\allowbreak ')
    }

    if (typeof fields.UR === 'string' && (typeof fields.DO === 'string' || typeof fields.AR === 'string')) delete fields.UR

    // the eprint identifies an unpublished work better than its DOI
    if (type === 'unpublished' && typeof fields.AR === 'string') delete fields.DO

    if (!type) {
      type = typeof fields.J2 === 'string' ? 'article' : 'unpublished'
      trace(`Unknown type (set to "${type}"): ${key}`)
    }

    if (this.options.nature) {
      if (typeof fields.DO === 'string') {
        fields.UR = `https://doi.org/${fields.DO}`
        delete fields.DO
      }
      else if (fields.AP === 'arXiv' && typeof fields.AR === 'string') {
        fields.UR = `https://arxiv.org/abs/${fields.AR}`
        delete fields.AP
        delete fields.AR
      }
    }
    else if (this.options.scipost) {
      if (fields.AP === 'arXiv' && typeof fields.AR === 'string') {
        fields.AR = `https://arxiv.org/abs/${fields.AR}`
        delete fields.AP
      }
      if ((fields.HP || '').match(/zenodo/i) && (fields.DO || '').match(/zenodo/i)) delete fields.HP
      if (type === 'unpublished') type = 'misc'
    }

    if (!this.options.arxiv && type !== 'misc' && type !== 'unpublished') {
      delete fields.AP
      delete fields.AR
    }

    return { input: block.lines.join('\n'), type, key, fields }
  }

  private sort(): void {
    const order = ({ key, fields }: Entry): SortKey => [
      parseDigits(fields.PY),
      fields.DA ?? '///',
      key,
      fields.J2 ?? '',
      parseDigits(fields.VL),
      parseDigits(fields.SP),
      fields.TI ?? '',
    ]
    this.entries.sort((a, b) => compare(order(a), order(b)))

    let end = 0
    for (let start = 0; start < this.entries.length; start = end) {
      while (end < this.entries.length && this.entries[end].key === this.entries[start].key) end++
      if (end - start < 2) continue

      this.entries.slice(start, end).forEach((entry, n) => {
        entry.key += sublabel(n, this.options.skipA)
        this.options.trace(`Sublabel: ${entry.key}`)
      })
    }
  }
}

/**
 * Reads RIS records into BibTeX entries, sorted by year and deduplicated citation keys. Records that cannot be converted are
 * listed in `errors`.
 */
export function parse(input: string, options: ParserOptions = {}): Library {
  const library = new Library(input, options)
  library.parse()
  return library
}
