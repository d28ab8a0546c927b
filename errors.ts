/**
 * Raised for malformed input inside a record; the parsers catch it, report it in `errors` and continue with the next record.
 */
export class ParsingError extends Error {
  constructor(message: string, location: string) {
    super(`${message} in ${location}`)
    this.name = 'ParsingError'
  }
}

export interface ParseError {
  error: string
  input?: string
}
