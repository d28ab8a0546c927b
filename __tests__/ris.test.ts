import { parse, ParserOptions } from '../ris'
import { write } from '../bibtex'

function ris(...records: string[][]): string {
  return records.map(lines => [...lines, 'ER  - '].join('\n')).join('\n') + '\n'
}

function convert(input: string, options: ParserOptions = {}): string {
  return write(parse(input, options).entries)
}

const einstein = [
  'TY  - JOUR',
  'AU  - Einstein, A.',
  'TI  - Zur Elektrodynamik bewegter Körper',
  'J2  - Ann. Phys.',
  'VL  - 322',
  'SP  - 891',
  'PY  - 1905',
  'UR  - https://doi.org/10.1002/andp.19053221004',
]

function smith(volume: string): string[] {
  return ['TY  - JOUR', 'AU  - Smith, J.', 'TI  - Phonons', 'J2  - J. Test', `VL  - ${volume}`, 'PY  - 2020']
}

describe('RIS records', () => {
  it('should convert a journal article', () => {
    expect(convert(ris(einstein))).toBe([
      '@article{Einstein1905,',
      ' author = {Einstein, A.},',
      '  title = {Zur Elektrodynamik bewegter K\\"orper},',
      'journal = {Ann. Phys.},',
      ' volume = {322},',
      '  pages = {891},',
      '   year = {1905},',
      '    doi = {10.1002/andp.19053221004},',
      '}',
      '',
    ].join('\n'))
  })

  it('should turn arXiv journal strings into eprints', () => {
    const input = ris(['TY  - JOUR', 'AU  - Doe, Jane', 'TI  - Phonons in NaCl: a review', 'J2  - arXiv:2101.00001 [cond-mat.str-el]', 'PY  - 2021'])
    expect(convert(input)).toBe([
      '@unpublished{Doe2021,',
      '       author = {Doe, Jane},',
      '        title = {Phonons in {NaCl}: A review},',
      '         year = {2021},',
      'archiveprefix = {arXiv},',
      '       eprint = {2101.00001},',
      '}',
      '',
    ].join('\n'))
  })

  it('should keep subtitles lowercase on request', () => {
    const input = ris(['TY  - JOUR', 'TI  - Phonons: a review', 'J2  - J. Test'])
    expect(parse(input, { subtitleCapitalization: false }).entries[0].fields.TI).toBe('Phonons: a review')
  })

  it('should keep protected words at the start of a subtitle', () => {
    const input = ris(['TY  - JOUR', 'TI  - Review: eV scale', 'J2  - J. Test'])
    expect(parse(input).entries[0].fields.TI).toBe('Review: {eV} scale')
  })

  it('should report records without a title', () => {
    const library = parse(ris(einstein, ['TY  - JOUR', 'AU  - Doe, J.']))
    expect(library.entries.map(entry => entry.key)).toEqual(['Einstein1905'])
    expect(library.errors).toEqual([{ error: 'Missing title in record at line 10', input: 'TY  - JOUR\nAU  - Doe, J.' }])
  })

  it('should label entries with the same key', () => {
    const messages: string[] = []
    const library = parse(ris(smith('10'), smith('9')), { trace: message => messages.push(message) })
    expect(library.entries.map(entry => [entry.key, entry.fields.VL])).toEqual([['Smith2020a', '9'], ['Smith2020b', '10']])
    expect(messages).toEqual(['Sublabel: Smith2020a', 'Sublabel: Smith2020b'])
  })

  it('should leave the first of several equal keys bare with skipA', () => {
    const library = parse(ris(smith('10'), smith('9')), { skipA: true })
    expect(library.entries.map(entry => entry.key)).toEqual(['Smith2020', 'Smith2020b'])
  })

  it('should sort by year', () => {
    const library = parse(ris(
      ['TY  - JOUR', 'AU  - Young, A.', 'TI  - Later', 'J2  - J. Test', 'PY  - 2021'],
      ['TY  - JOUR', 'AU  - Old, B.', 'TI  - Earlier', 'J2  - J. Test', 'PY  - 2019'],
    ))
    expect(library.entries.map(entry => entry.key)).toEqual(['Old2019', 'Young2021'])
  })

  it('should read Materials Cloud Archive records', () => {
    const input = ris(['TY  - COMP', 'AU  - Doe, Jane', 'TI  - Phonon data', 'PY  - 2022', 'UR  - https://archive.materialscloud.org/record/2022.45'])
    expect(convert(input)).toBe([
      '@article{Doe2022,',
      ' author = {Doe, Jane},',
      '  title = {Phonon data},',
      'journal = {Materials Cloud Archive},',
      ' volume = {2022},',
      '  pages = {45},',
      '   year = {2022},',
      '    url = {https://archive.materialscloud.org/record/2022.45},',
      '}',
      '',
    ].join('\n'))
  })

  it('should describe where misc entries are published', () => {
    const input = 'TY  - COMP\nAU  - Doe, Jane\nTI  - Data set\nPY  - 2020\nUR  - https://example.org/data/set'
    const [entry] = parse(input).entries
    expect(entry.type).toBe('misc')
    expect(entry.fields.HP).toBe('example.org/\\allowbreak data/\\allowbreak set')
    expect(entry.fields.UR).toBe('https://example.org/data/set')
  })

  it('should spell out thesis types', () => {
    const library = parse(ris(
      ['TY  - THES', 'AU  - Doe, Jane', 'TI  - Phonons', 'M3  - Master thesis', 'PY  - 2020'],
      ['TY  - THES', 'AU  - Roe, Rick', 'TI  - Phonons', 'M3  - PhD', 'PY  - 2021'],
    ))
    expect(library.entries.map(entry => entry.fields.M3)).toEqual(["Master's thesis", undefined])
  })

  it('should shorten long author lists', () => {
    const input = ris(['TY  - JOUR', 'AU  - Doe, Jane', 'AU  - Roe, Rick', 'AU  - Poe, Edgar', 'TI  - Phonons', 'J2  - J. Test'])
    expect(parse(input).entries[0].fields.AU).toBe('Doe, Jane and Roe, Rick and Poe, Edgar')
    expect(parse(input, { etal: 3 }).entries[0].fields.AU).toBe('Doe, Jane and Roe, Rick and Poe, Edgar')
    expect(parse(input, { etal: 2 }).entries[0].fields.AU).toBe('Doe, Jane and others')
  })

  it('should write special spaces in names as plain spaces', () => {
    const input = ris(['TY  - JOUR', 'AU  - Doe,\u00A0Jane', 'TI  - Phonons', 'J2  - J. Test'])
    expect(parse(input).entries[0].fields.AU).toBe('Doe, Jane')
  })

  it('should give DOIs as URLs in Nature style', () => {
    const input = ris(['TY  - JOUR', 'AU  - Doe, Jane', 'TI  - Phonons', 'J2  - J. Test', 'DO  - 10.1000/xyz'])
    const { fields } = parse(input, { nature: true }).entries[0]
    expect(fields.UR).toBe('https://doi.org/10.1000/xyz')
    expect(fields.DO).toBeUndefined()
  })

  it('should give eprints as URLs in SciPost style', () => {
    const input = ris(['TY  - JOUR', 'AU  - Doe, Jane', 'TI  - Phonons', 'J2  - arXiv:2101.00001', 'PY  - 2021'])
    const [entry] = parse(input, { scipost: true }).entries
    expect(entry.type).toBe('misc')
    expect(entry.fields.AR).toBe('https://arxiv.org/abs/2101.00001')
    expect(entry.fields.AP).toBeUndefined()
  })

  it('should drop eprints of published works on request', () => {
    const input = ris([...einstein, 'L1  - https://arxiv.org/abs/0001.00001v2'])
    expect(parse(input).entries[0].fields.AR).toBe('0001.00001')
    expect(parse(input, { arxiv: false }).entries[0].fields.AR).toBeUndefined()
  })

  it('should guess unknown types', () => {
    const messages: string[] = []
    const library = parse(ris(['AU  - Doe, Jane', 'TI  - Phonons', 'J2  - J. Test', 'PY  - 2020']), { trace: message => messages.push(message) })
    expect(library.entries[0].type).toBe('article')
    expect(messages).toEqual(['Unknown type (set to "article"): Doe2020'])
  })

  it('should report links without an identifier and keep the record', () => {
    const library = parse(ris(['TY  - JOUR', 'AU  - Doe, Jane', 'TI  - Phonons', 'J2  - J. Test', 'L1  - https://arxiv.org/list/foo']))
    expect(library.entries).toHaveLength(1)
    expect(library.errors.map(error => error.error)).toEqual(['No arXiv identifier in https://arxiv.org/list/foo in record at line 1'])
  })

  it('should replace en dashes between words on request', () => {
    const input = ris(['TY  - JOUR', 'TI  - Fermi–Dirac statistics', 'J2  - J. Test'])
    expect(parse(input).entries[0].fields.TI).toBe('Fermi--{Dirac} statistics')
    expect(parse(input, { nodash: true }).entries[0].fields.TI).toBe('Fermi-{Dirac} statistics')
  })

  it('should take the journal from T2 when J2 is missing', () => {
    const input = ris(['TY  - JOUR', 'AU  - Doe, Jane', 'TI  - Phonons', 'T2  - Phys. Rev. B', 'PY  - 2020'])
    const { type, fields } = parse(input).entries[0]
    expect(type).toBe('article')
    expect(fields.J2).toBe('Phys. Rev. B')
    expect(fields.T2).toBeUndefined()
  })

  it('should treat works published by arXiv as unpublished', () => {
    const input = ris(['TY  - RPRT', 'AU  - Doe, Jane', 'TI  - Phonons', 'PB  - arXiv', 'PY  - 2020'])
    expect(parse(input).entries[0].type).toBe('unpublished')
  })

  it('should cite unpublished eprints without their DOI', () => {
    const input = ris(['TY  - JOUR', 'AU  - Doe, Jane', 'TI  - Phonons', 'J2  - arXiv:2101.00001', 'DO  - 10.48550/arXiv.2101.00001', 'PY  - 2021'])
    const { type, fields } = parse(input).entries[0]
    expect(type).toBe('unpublished')
    expect(fields.AR).toBe('2101.00001')
    expect(fields.DO).toBeUndefined()
  })

  it('should publish Zenodo records on Zenodo', () => {
    const input = ris(['TY  - COMP', 'AU  - Doe, Jane', 'TI  - Phonon data', 'UR  - https://zenodo.org/record/123', 'DO  - 10.5281/zenodo.123', 'PY  - 2020'])
    const { type, fields } = parse(input).entries[0]
    expect(type).toBe('misc')
    expect(fields.HP).toBe('Zenodo')
    expect(fields.UR).toBeUndefined()
    expect(parse(input, { scipost: true }).entries[0].fields.HP).toBeUndefined()
  })

  it('should sort unknown parts of a date after known ones', () => {
    const library = parse(ris(
      ['TY  - JOUR', 'AU  - Smith, J.', 'TI  - Phonons', 'J2  - J. Test', 'VL  - 1', 'PY  - 2020', 'DA  - 2020//'],
      ['TY  - JOUR', 'AU  - Smith, J.', 'TI  - Phonons', 'J2  - J. Test', 'VL  - 2', 'PY  - 2020', 'DA  - 2020/03/'],
    ))
    expect(library.entries.map(({ key, fields }) => [key, fields.VL, fields.DA])).toEqual([
      ['Smith2020a', '2', '2020\\03\\'],
      ['Smith2020b', '1', '2020\\\\'],
    ])
  })

  it('should read Windows files with a byte order mark', () => {
    const library = parse('\uFEFFTY  - JOUR\r\nTI  - Phonons\r\nJ2  - J. Test\r\nPY  - 2020\r\nER  - \r\n')
    expect(library.entries.map(entry => [entry.key, entry.fields.TI])).toEqual([['Unknown2020', 'Phonons']])
    expect(library.errors).toEqual([])
  })
})
