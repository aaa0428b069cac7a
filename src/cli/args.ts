export interface ParsedArgs {
  args: Record<string, string>
  positional: string[]
  errors: string[]
}

const BOOLEAN_FLAGS = new Set([
  'only-open', 'no-save', 'ui', 'verbose', 'help', 'version',
])

const VALUE_FLAGS = new Set([
  'ports', 'timeout', 'banner-timeout', 'concurrency', 'output', 'output-dir', 'ui-port',
])

const SHORT_FLAGS: Record<string, string> = {
  p: 'ports',
  t: 'timeout',
  b: 'banner-timeout',
  c: 'concurrency',
  o: 'output',
  h: 'help',
  v: 'version',
}

/**
 * Split argv (without node and script path) into flags and positionals.
 * Problems are collected in `errors` rather than thrown.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args: Record<string, string> = {}
  const positional: string[] = []
  const errors: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    let key: string
    let inline: string | undefined
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=')
      key = eq === -1 ? arg.slice(2) : arg.slice(2, eq)
      inline = eq === -1 ? undefined : arg.slice(eq + 1)
    } else if (arg.startsWith('-') && arg.length > 1) {
      const short = arg.slice(1)
      const long = SHORT_FLAGS[short]
      if (!long) {
        errors.push(`unknown flag -${short}`)
        continue
      }
      key = long
    } else {
      positional.push(arg)
      continue
    }

    if (BOOLEAN_FLAGS.has(key)) {
      args[key] = 'true'
    } else if (VALUE_FLAGS.has(key)) {
      if (inline !== undefined) {
        args[key] = inline
      } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i]
      } else {
        errors.push(`--${key} requires a value`)
      }
    } else {
      errors.push(`unknown flag --${key}`)
    }
  }

  return { args, positional, errors }
}
