import { format, write, Entry } from '../bibtex'

const einstein: Entry = {
  input: '',
  type: 'article',
  key: 'Einstein1905',
  fields: {
    AU: 'Einstein, A.',
    TI: 'Zur Elektrodynamik bewegter K\\"orper',
    J2: 'Ann. Phys.',
    VL: '322',
    SP: '891',
    PY: '1905',
    DO: '10.1002/andp.19053221004',
    UR: 'https://example.org/ignored',
    CY: 'Leipzig',
  },
}

describe('BibTeX', () => {
  it('should align field names', () => {
    expect(format(einstein)).toBe([
      '@article{Einstein1905,',
      ' author = {Einstein, A.},',
      '  title = {Zur Elektrodynamik bewegter K\\"orper},',
      'journal = {Ann. Phys.},',
      ' volume = {322},',
      '  pages = {891},',
      '   year = {1905},',
      '    url = {https://example.org/ignored},',
      '    doi = {10.1002/andp.19053221004},',
      '}',
      '',
    ].join('\n'))
  })

  it('should only write the fields of the entry type', () => {
    const thesis: Entry = { input: '', type: 'phdthesis', key: 'Doe2020', fields: { AU: 'Doe, J.', TI: 'Phonons', PB: 'Univ.', J2: 'unused' } }
    expect(format(thesis)).toBe('@phdthesis{Doe2020,\nauthor = {Doe, J.},\n title = {Phonons},\nschool = {Univ.},\n}\n')
  })

  it('should write entries one after another', () => {
    const empty: Entry = { input: '', type: 'misc', key: 'X', fields: {} }
    expect(write([empty, empty])).toBe('@misc{X,\n}\n@misc{X,\n}\n')
  })
})
