#!/usr/bin/env node
import { createProgram } from './cli.js'
import { loadConfig } from './config/loader.js'
import { createHandlers } from './pipeline.js'
import { errorMessage } from './utils/errors.js'

async function main() {
  const program = createProgram(createHandlers(() => loadConfig()))
  await program.parseAsync(process.argv)
}

main().catch((err) => {
  console.error(`[issue-corpus] ${errorMessage(err)}`)
  process.exit(1)
})
