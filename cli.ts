import { parseArgs } from 'util'

import { ParserOptions } from './ris'
import { Options as BibliographyOptions } from './bbl'

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export type Invocation<T> = {
  input: string
  output: string
  options: T
  /** one line per option given, describing its effect */
  settings: string[]
}

export const Usage = {
  ris2bib: `Usage: ris2bib <input.ris> <output.bib> [options]

  --sub=FORMAT        subscript markup, X stands for the text (default \\textsubscript{X})
  --super=FORMAT      superscript markup, X stands for the text (default \\textsuperscript{X})
  --colcap=0|1        capitalize the first word after a colon (default 1)
  --nodash=0|1        replace en dashes between words by hyphens (default 0)
  --short-year=0|1    two-digit years in citation keys (default 0)
  --skip-a=0|1        no sublabel "a" on the first of several equal keys (default 0)
  --arxiv=0|1         include eprint identifiers of published works (default 1)
  --nature=0|1        DOIs and eprints as URLs (default 0)
  --scipost=0|1       eprints as URLs, misc instead of unpublished (default 0)
  --etal=N            only the first author when there are more than N (default 0: all)`,
  bbl2html: `Usage: bbl2html <input.bbl> <output.html> [--citekeys]

  --citekeys          numbered list with citation keys as ids`,
  bbl2tex: 'Usage: bbl2tex <input.bbl> <output.tex>',
}

function files(positionals: string[], usage: string): [string, string] {
  if (positionals.length !== 2) throw new UsageError(usage)
  return [positionals[0], positionals[1]]
}

function flag(value: string, name: string): boolean {
  if (value === '0' || value === '1') return value === '1'
  throw new UsageError(`--${name} takes 0 or 1, not ${JSON.stringify(value)}`)
}

// parseArgs reports unknown options and missing values with an ERR_PARSE_ARGS_* code
function isArgumentError(err: unknown): err is Error {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('ERR_PARSE_ARGS_')
}

function guarded<T>(usage: string, parse: () => T): T {
  try {
    return parse()
  }
  catch (err) {
    if (isArgumentError(err)) throw new UsageError(`${err.message}\n\n${usage}`)
    throw err
  }
}

export function ris2bib(argv: string[]): Invocation<ParserOptions> {
  const { values, positionals } = guarded(Usage.ris2bib, () => parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      sub: { type: 'string' },
      super: { type: 'string' },
      colcap: { type: 'string' },
      nodash: { type: 'string' },
      'short-year': { type: 'string' },
      'skip-a': { type: 'string' },
      arxiv: { type: 'string' },
      nature: { type: 'string' },
      scipost: { type: 'string' },
      etal: { type: 'string' },
    },
  }))
  const [input, output] = files(positionals, Usage.ris2bib)

  const options: ParserOptions = {}
  const settings: string[] = []

  for (const [name, value] of Object.entries(values)) {
    if (typeof value !== 'string') continue

    switch (name) {
      case 'sub':
        options.sub = value
        settings.push(`Subscript format: ${value}`)
        break
      case 'super':
        options.sup = value
        settings.push(`Superscript format: ${value}`)
        break
      case 'colcap':
        options.subtitleCapitalization = flag(value, name)
        settings.push(`Capitalize after colon: ${options.subtitleCapitalization}`)
        break
      case 'nodash':
        options.nodash = flag(value, name)
        settings.push(`Replace en dashes by hyphens: ${options.nodash}`)
        break
      case 'short-year':
        options.shortYear = flag(value, name)
        settings.push(`Use short year in identifiers: ${options.shortYear}`)
        break
      case 'skip-a':
        options.skipA = flag(value, name)
        settings.push(`Omit sublabel a: ${options.skipA}`)
        break
      case 'arxiv':
        options.arxiv = flag(value, name)
        settings.push(`Include eprint identifiers: ${options.arxiv}`)
        break
      case 'nature':
        options.nature = flag(value, name)
        settings.push(`Nature DOI style: ${options.nature}`)
        break
      case 'scipost':
        options.scipost = flag(value, name)
        settings.push(`SciPost eprint style: ${options.scipost}`)
        break
      case 'etal':
        if (!value.match(/^\d+$/)) throw new UsageError(`--etal takes a number, not ${JSON.stringify(value)}`)
        options.etal = parseInt(value, 10)
        settings.push(`Maximum number of listed authors: ${options.etal}`)
        break
    }
  }

  return { input, output, options, settings }
}

export function bbl2html(argv: string[]): Invocation<BibliographyOptions> {
  const { values, positionals } = guarded(Usage.bbl2html, () => parseArgs({
    args: argv,
    allowPositionals: true,
    options: { citekeys: { type: 'boolean' } },
  }))
  const [input, output] = files(positionals, Usage.bbl2html)

  const citekeys = values.citekeys === true
  return { input, output, options: { citekeys }, settings: citekeys ? ['Number references by citation key'] : [] }
}

export function bbl2tex(argv: string[]): Invocation<Record<string, never>> {
  const { positionals } = guarded(Usage.bbl2tex, () => parseArgs({ args: argv, allowPositionals: true }))
  const [input, output] = files(positionals, Usage.bbl2tex)
  return { input, output, options: {}, settings: [] }
}
