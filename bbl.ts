import { Root, Macro, Node, String as StringNode } from '@unified-latex/unified-latex-types'
import { LatexPegParser } from '@unified-latex/unified-latex-util-pegjs'
import { printRaw } from '@unified-latex/unified-latex-util-print-raw'
import { latex2unicode as latex2unicodemap, combining } from 'unicode2latex'

import { ParseError } from './errors'

export type Format = 'html' | 'tex'

export type Bibitem = {
  key: string
  /** the LaTeX between `\BibitemOpen` and `\BibitemShut` */
  body: string
}

export type Reference = {
  key: string
  text: string
}

export type Bibliography = {
  references: Reference[]
  errors: ParseError[]
}

export type Options = {
  /** number the list and give each item its citation key as id, so in-page `#key` links become reference numbers */
  citekeys?: boolean
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'object' && value !== null && 'text' in value && typeof value.text === 'string') return value.text
  return undefined
}

const unicode: Map<string, string> = new Map()
for (const [tex, value] of Object.entries(latex2unicodemap)) {
  const chars = textOf(value)
  if (chars) unicode.set(tex, chars)
}
const marks: Map<string, string> = new Map(Object.entries(combining.tounicode))

const narguments: Record<string, number> = {
  bibinfo: 2,
  bibfield: 2,
  bibnamefont: 1,
  bibfnamefont: 1,
  href: 2,
  Eprint: 2,
  url: 1,
  emph: 1,
  textit: 1,
  textbf: 1,
  textsc: 1,
  textsubscript: 1,
  textsuperscript: 1,
  natexlab: 1,
}
const accents = new Set(["'", '"', '`', '^', '~', '=', '.', 'b', 'c', 'd', 'H', 'k', 'r', 'u', 'v', ...marks.keys()])
for (const accent of accents) {
  narguments[accent] = 1
}

const markup: Record<string, { tag: string, style?: string }> = {
  emph: { tag: 'em' },
  textit: { tag: 'i' },
  textbf: { tag: 'b' },
  textsc: { tag: 'span', style: 'font-variant: small-caps' },
  textsuperscript: { tag: 'sup' },
}

// revtex bookkeeping without output
const invisible = new Set(['EOS', 'relax', 'unskip', '@'])

const special = new Set(['&', '%', '#', '_', '$', '{', '}'])

/**
 * The bibitems of a `.bbl` file, without the `\providecommand` that defines `\BibitemOpen` in revtex bibliographies.
 */
export function bibitems(bbl: string): Bibitem[] {
  const items: Bibitem[] = []
  for (const [, key, preamble, body] of bbl.matchAll(/\{([^{}]*?)\}([^{}]*?)\\BibitemOpen([\s\S]+?)\\BibitemShut/g)) {
    if (preamble.match(/\\(?:providecommand|newcommand|renewcommand|def)\s*$/)) continue
    items.push({ key, body })
  }
  return items
}

/**
 * Strips TeX comments and joins the lines of a bibitem body.
 */
export function clean(body: string): string {
  return body
    .replace(/(?<!\\)%[^\n]*(\n[ \t]*)?/g, '')
    .replace(/\s+/g, ' ')
    .replace(/(?<!\\)\\ /g, ' ')
    .trim()
}

class Renderer {
  public errors: ParseError[] = []
  private unhandled: Set<string> = new Set()

  constructor(private format: Format) {}

  public render(body: string): string {
    const ast: Root = LatexPegParser.parse(clean(body))
    return this.nodes(ast.content, false).replace(/\s+/g, ' ').trim()
  }

  private text(s: string, url: boolean): string {
    if (url || this.format === 'tex') return s
    return s
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/---/g, '&mdash;')
      .replace(/--/g, '&ndash;')
      .replace(/~/g, '&nbsp;')
      .replace(/(?<=\w)'/g, '&rsquo;')
  }

  private nodes(content: Node[], url: boolean): string {
    const nodes = [...content]
    let rendered = ''
    let text = ''
    const flush = () => {
      rendered += this.text(text, url)
      text = ''
    }

    let node: Node | undefined
    while ((node = nodes.shift())) {
      switch (node.type) {
        case 'string':
          text += node.content
          break

        case 'whitespace':
        case 'parbreak':
          if (!url) text += ' '
          break

        case 'comment':
          break

        case 'group':
          flush()
          rendered += this.format === 'tex' && !url ? `{${this.nodes(node.content, url)}}` : this.nodes(node.content, url)
          break

        case 'macro':
          flush()
          rendered += this.macro(node, this.args(nodes, narguments[node.content] || 0), url)
          // the space that ends a macro name
          if (this.format === 'html' && node.content.match(/^[a-z]+$/i) && !narguments[node.content] && nodes[0]?.type === 'whitespace') nodes.shift()
          break

        default:
          flush()
          rendered += printRaw(node)
          break
      }
    }
    flush()

    return rendered
  }

  // the arguments TeX would take: braced groups, or single characters of the text that follows
  private args(nodes: Node[], n: number): Node[] {
    const args: Node[] = []
    while (args.length < n) {
      if (nodes[0]?.type === 'whitespace') nodes.shift()

      const next = nodes.shift()
      if (!next) break

      if (next.type === 'string' && next.content) {
        const [char, ...rest] = Array.from(next.content)
        const arg: StringNode = { type: 'string', content: char }
        args.push(arg)
        if (rest.length) nodes.unshift({ ...next, content: rest.join('') })
      }
      else {
        args.push(next)
      }
    }
    return args
  }

  private arg(node: Node | undefined, url = false): string {
    if (!node) return ''
    return node.type === 'group' ? this.nodes(node.content, url) : this.nodes([node], url)
  }

  private raw(macro: Macro, args: Node[]): string {
    let tex = `\\${macro.content}`
    for (const arg of args) {
      tex += (arg.type === 'string' && tex.match(/[a-z]$/i) ? ' ' : '') + printRaw(arg)
    }
    return tex
  }

  private link(url: string, label: string): string {
    if (this.format === 'tex') return `\\href{${url}}{${label}}`
    return `<a href='${url.replace(/&/g, '&amp;').replace(/'/g, '%27')}'>${label}</a>`
  }

  private macro(macro: Macro, args: Node[], url: boolean): string {
    const name = macro.content
    const tex = this.format === 'tex'

    switch (name) {
      case 'bibinfo':
      case 'bibfield':
        return this.arg(args[1], url)

      case 'bibnamefont':
      case 'bibfnamefont':
        return this.arg(args[0], url)

      case 'href':
      case 'Eprint':
        return this.link(this.arg(args[0], true), this.arg(args[1]))

      case 'url': {
        const target = this.arg(args[0], true)
        return tex ? `\\url{${target}}` : this.link(target, target)
      }

      case 'doibase':
        return 'https://doi.org/'

      case 'natexlab':
        return ''

      case 'textsubscript': {
        const sub = this.arg(args[0])
        if (tex) return `\\textsubscript{${sub}}`
        return sub.match(/^\d$/) ? `&#x208${sub};` : `<sub>${sub}</sub>`
      }

      case 'allowbreak':
        return tex ? '\\allowbreak ' : '&#x200B;'

      case ' ':
        return ' '
    }

    if (invisible.has(name)) return ''

    const format = markup[name]
    if (format) {
      const content = this.arg(args[0])
      if (tex) return `\\${name}{${content}}`
      return `<${format.tag}${format.style ? ` style='${format.style}'` : ''}>${content}</${format.tag}>`
    }

    if (special.has(name)) return tex ? `\\${name}` : (name === '&' && !url ? '&amp;' : name)

    if (accents.has(name)) return tex ? this.raw(macro, args) : this.accent(macro, args)

    if (tex) return this.raw(macro, args)

    const symbol = unicode.get(`\\${name}`)
    if (typeof symbol === 'string') return symbol

    const raw = this.raw(macro, args)
    if (!this.unhandled.has(name)) {
      this.unhandled.add(name)
      this.errors.push({ error: `unhandled macro \\${name}`, input: raw })
    }
    return raw
  }

  private accent(macro: Macro, args: Node[]): string {
    const name = macro.content
    const char = this.arg(args[0])

    if (char.match(/^[aeiou]$/i)) {
      if (name === "'") return `&${char}acute;`
      if (name === '"') return `&${char}uml;`
    }

    const composed = unicode.get(`\\${name}{${char}}`) ?? unicode.get(`\\${name}${char}`)
    if (composed) return composed

    const mark = marks.get(name)
    if (mark && char.length === 1) return `${char}${mark}`.normalize('NFC')

    return this.raw(macro, args)
  }
}

/**
 * Renders every bibitem of a `.bbl` file. Bibitems that cannot be parsed are listed in `errors`, as are macros the HTML
 * renderer does not know.
 */
export function render(bbl: string, format: Format): Bibliography {
  const renderer = new Renderer(format)
  const references: Reference[] = []
  const errors: ParseError[] = []

  for (const { key, body } of bibitems(bbl)) {
    try {
      references.push({ key, text: renderer.render(body) })
    }
    catch (err) {
      if (!(err instanceof Error)) throw err
      errors.push({ error: `${key}: ${err.message}`, input: body })
    }
  }

  return { references, errors: [...errors, ...renderer.errors] }
}

const numbering = `<script>
    const links = document.getElementsByTagName('a')
    const bib = document.getElementById('bibliography')
    const refs = new Array()
    for (let i = 0; i < links.length; i++) {
        let href = links[i].getAttribute('href')
        if (href && href.startsWith('#')) {
            let ref = document.getElementById(href.substring(1))
            if (ref && bib.contains(ref)) {
                links[i].innerText = refs.indexOf(ref) + 1 || refs.push(ref)
            }
        }
    }
    if (refs.length) bib.replaceChildren(...refs)
</script>`

/**
 * A standalone HTML page listing the references of a `.bbl` file.
 */
export function html(bibliography: Bibliography, options: Options = {}): string {
  const lines = ['<!DOCTYPE html>', '<html>', '<body>', options.citekeys ? "<ol id='bibliography'>" : '<ul>']
  for (const { key, text } of bibliography.references) {
    lines.push(options.citekeys ? `<li id='${key}'> ${text}` : `<li> ${text}`)
  }
  if (options.citekeys) {
    lines.push('</ol>', numbering)
  }
  else {
    lines.push('</ul>')
  }
  lines.push('</body>', '</html>', '')
  return lines.join('\n')
}

/**
 * A standalone LaTeX document listing the references of a `.bbl` file.
 */
export function latex(bibliography: Bibliography): string {
  return [
    '\\documentclass{article}',
    '\\usepackage[colorlinks]{hyperref}',
    '\\begin{document}',
    '\\begin{itemize}',
    ...bibliography.references.map(({ text }) => `    \\item ${text}`),
    '\\end{itemize}',
    '\\end{document}',
    '',
  ].join('\n')
}
