import * as ris from './ris'
import * as bibtex from './bibtex'
import * as bbl from './bbl'
import { ParseError } from './errors'

export { protect, capitalizeSubtitles, Options as ProtectionOptions } from './protect'
export { mask, unmask, Masked } from './grouping'
export { tokenize, lex, Separators, Token } from './tokenizer'
export { isFragile, Rules, FragilityRules, EponymMatching } from './fragile'
export { escape, unescaped } from './escape'
export { simplify, citationKey, sublabel } from './keys'
export { ParserOptions, Library } from './ris'
export { Entry, EntryType, Fields, Tag } from './bibtex'
export { Bibliography, Reference, Format } from './bbl'
export { ParseError, ParsingError } from './errors'
export { Tables } from './tables'

export type Conversion = {
  output: string
  errors: ParseError[]
}

/**
 * Converts an RIS export to BibTeX with case-protected titles.
 */
export function ris2bib(input: string, options: ris.ParserOptions = {}): Conversion {
  const library = ris.parse(input, options)
  return { output: bibtex.write(library.entries), errors: library.errors }
}

/**
 * Converts the bibliography of a `.bbl` file to a standalone HTML page.
 */
export function bbl2html(input: string, options: bbl.Options = {}): Conversion {
  const bibliography = bbl.render(input, 'html')
  return { output: bbl.html(bibliography, options), errors: bibliography.errors }
}

/**
 * Converts the bibliography of a `.bbl` file to a standalone LaTeX document.
 */
export function bbl2tex(input: string): Conversion {
  const bibliography = bbl.render(input, 'tex')
  return { output: bbl.latex(bibliography), errors: bibliography.errors }
}
