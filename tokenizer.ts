import moo from 'moo'

import * as rx from './re'

/**
 * Characters that split a title into words: space, hyphen, period, colon, comma, semicolon, parentheses, brackets and slash,
 * plus the no-break space, thin space, unbreakable hyphen, en dash and em dash.
 */
export const Separators = ' -.:,;()[]/\u00A0\u2009\u2010\u2013\u2014'

export type Token = {
  type: 'separator' | 'word'
  text: string
  offset: number
}

const lexers: Map<string, moo.Lexer> = new Map()

function lexer(separators: string): moo.Lexer {
  let compiled = lexers.get(separators)
  if (!compiled) {
    compiled = moo.compile({
      separator: { match: new RegExp(`${rx.match(separators)}+`, 'u'), lineBreaks: true },
      word: { match: new RegExp(`${rx.match(separators, true)}+`, 'u'), lineBreaks: true },
    })
    lexers.set(separators, compiled)
  }
  return compiled
}

/**
 * Splits `s` into alternating runs of separator and non-separator characters, such that the runs concatenate back to `s`.
 */
export function lex(s: string, separators: string = Separators): Token[] {
  if (!s) return []
  if (!separators) return [{ type: 'word', text: s, offset: 0 }]

  const tokens: Token[] = []
  for (const token of lexer(separators).reset(s)) {
    tokens.push({ type: token.type === 'separator' ? 'separator' : 'word', text: token.text, offset: token.offset })
  }
  return tokens
}

export function tokenize(s: string, separators: string = Separators): string[] {
  return lex(s, separators).map(token => token.text)
}
