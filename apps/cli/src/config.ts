import type { ParsedArgs } from './parse-flags.js'

export type OutputFormat = 'text' | 'json'

const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json']

export interface CliConfig {
  url: string
  format: OutputFormat
  timeoutMs?: number
}

/**
 * Bad arguments or environment. The CLI exits with `exitCode` after
 * printing the message and the usage text.
 */
export class CliUsageError extends Error {
  readonly exitCode = 2

  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value)
}

function parseFormat(value: string | boolean | undefined, source: string): OutputFormat {
  if (value === undefined || value === '') return 'text'
  if (typeof value === 'string' && isOutputFormat(value)) return value
  throw new CliUsageError(`${source} must be one of: ${OUTPUT_FORMATS.join(', ')}`)
}

function parseTimeout(value: string | boolean | undefined, source: string): number | undefined {
  if (value === undefined || value === '') return undefined
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const parsed = Number.parseInt(value, 10)
    if (parsed > 0) return parsed
  }
  throw new CliUsageError(`${source} must be a positive integer (milliseconds)`)
}

/**
 * Resolve CLI settings. Flags win over environment variables:
 * --format / METAGET_FORMAT, --timeout-ms / METAGET_TIMEOUT_MS.
 */
export function loadCliConfig(args: ParsedArgs, env: NodeJS.ProcessEnv): CliConfig {
  const [url, ...extra] = args.positionals
  if (!url) {
    throw new CliUsageError('Missing <url> argument')
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${extra.join(' ')}`)
  }

  const format =
    args.flags.format !== undefined
      ? parseFormat(args.flags.format, '--format')
      : parseFormat(env.METAGET_FORMAT, 'METAGET_FORMAT')

  const timeoutMs =
    args.flags['timeout-ms'] !== undefined
      ? parseTimeout(args.flags['timeout-ms'], '--timeout-ms')
      : parseTimeout(env.METAGET_TIMEOUT_MS, 'METAGET_TIMEOUT_MS')

  return timeoutMs === undefined ? { url, format } : { url, format, timeoutMs }
}
