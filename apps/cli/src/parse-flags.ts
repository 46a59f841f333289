/**
 * Split argv into `--flag value` pairs and positional tokens.
 *
 * A flag takes the following token as its value unless that token is another
 * flag or the flag is known to be boolean.
 */

const BOOLEAN_FLAGS = new Set(['help', 'h'])

export interface ParsedArgs {
  positionals: string[]
  flags: Record<string, string | boolean>
}

export function parseFlags(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {}
  const positionals: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === '-h') {
      flags.h = true
      continue
    }
    if (!token.startsWith('--')) {
      positionals.push(token)
      continue
    }

    const key = token.slice(2)
    const next = argv[i + 1]
    if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
      flags[key] = next
      i++
    } else {
      flags[key] = true
    }
  }

  return { positionals, flags }
}
