import { isMetaExtractionError, type ExtractorOptions, type MetaTag } from '@metaget/core'
import { CliUsageError, loadCliConfig, type CliConfig } from './config.js'
import { formatTags } from './format.js'
import { parseFlags } from './parse-flags.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export const USAGE = [
  'Usage: metaget <url> [--format text|json] [--timeout-ms <n>]',
  '',
  'Fetches <url> and prints its <meta> name/content pairs in document order.',
  '',
  'Options:',
  '  --format <text|json>   Output format (env METAGET_FORMAT, default text)',
  '  --timeout-ms <n>       Abort the request after n milliseconds (env METAGET_TIMEOUT_MS)',
  '  -h, --help             Show this help',
].join('\n')

export interface CliDeps {
  createExtractor(options: ExtractorOptions): { extract(url: string): Promise<MetaTag[]> }
  stdout(text: string): void
  stderr(text: string): void
}

/**
 * Run one CLI invocation and return its exit code.
 */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv, deps: CliDeps): Promise<number> {
  const args = parseFlags(argv)
  if (args.flags.help === true || args.flags.h === true) {
    deps.stdout(USAGE)
    return EXIT_OK
  }

  let config: CliConfig
  try {
    config = loadCliConfig(args, env)
  } catch (error) {
    if (error instanceof CliUsageError) {
      deps.stderr(error.message)
      deps.stderr(USAGE)
      return error.exitCode
    }
    throw error
  }

  const extractor = deps.createExtractor({ timeoutMs: config.timeoutMs })

  let tags: MetaTag[]
  try {
    tags = await extractor.extract(config.url)
  } catch (error) {
    if (isMetaExtractionError(error)) {
      deps.stderr(`metaget: ${error.message}`)
      return EXIT_FAILURE
    }
    throw error
  }

  const output = formatTags(tags, config.format)
  if (output !== '') {
    deps.stdout(output)
  }
  return EXIT_OK
}
