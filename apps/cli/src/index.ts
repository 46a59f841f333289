#!/usr/bin/env node
import './env.js'
import { Extractor } from '@metaget/core'
import { createLogger, setLogLevel } from '@metaget/logger'
import { runCli } from './run.js'

// Logs share the terminal with the command's output; keep them to errors
// unless LOG_LEVEL asks for more.
if (!process.env.LOG_LEVEL) {
  setLogLevel('error')
}

const logger = createLogger('metaget').child('cli')

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), process.env, {
    createExtractor: options => new Extractor({ ...options, logger: logger.child('extractor') }),
    stdout: text => process.stdout.write(`${text}\n`),
    stderr: text => process.stderr.write(`${text}\n`),
  })
}

main().catch(error => {
  logger.fatal('Unhandled CLI error', {}, error)
  process.exit(1)
})
