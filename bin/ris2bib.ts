#!/usr/bin/env node
// tslint:disable no-console

import * as fs from 'fs'

import * as cli from '../cli'
import { ris2bib } from '../index'

function main(argv: string[]): number {
  let invocation: ReturnType<typeof cli.ris2bib>
  try {
    invocation = cli.ris2bib(argv)
  }
  catch (err) {
    if (!(err instanceof cli.UsageError)) throw err
    console.error(err.message)
    return 2
  }

  for (const setting of invocation.settings) {
    console.log(setting)
  }

  const { output, errors } = ris2bib(fs.readFileSync(invocation.input, 'utf-8'), { ...invocation.options, trace: message => console.log(message) })
  for (const err of errors) {
    console.error(err.error)
  }
  fs.writeFileSync(invocation.output, output, 'utf-8')

  return 0
}

process.exitCode = main(process.argv.slice(2))
