import { ValidationError } from '../../plumbing/errors.ts'

export interface ParsedArgs {
  command: string | undefined
  positionals: string[]
  flags: Record<string, string | true>
}

const BOOLEAN_FLAGS = new Set(['fleet', 'keep-usage', 'list', 'help'])

/**
 * `command <positionals> --flag value --switch`. `--flag=value` also works.
 */
export const parseArgs = (argv: string[]): ParsedArgs => {
  const positionals: string[] = []
  const flags: Record<string, string | true> = {}

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? ''
    if (!arg.startsWith('--')) {
      positionals.push(arg)
      continue
    }

    const body = arg.slice(2)
    const separator = body.indexOf('=')
    if (separator !== -1) {
      flags[body.slice(0, separator)] = body.slice(separator + 1)
      continue
    }
    if (BOOLEAN_FLAGS.has(body)) {
      flags[body] = true
      continue
    }

    const value = argv[index + 1]
    if (value === undefined || value.startsWith('--')) {
      throw new ValidationError(`--${body} needs a value`)
    }
    flags[body] = value
    index += 1
  }

  const [command, ...rest] = positionals
  return { command, positionals: rest, flags }
}

export const stringFlag = (
  args: ParsedArgs,
  name: string,
): string | undefined => {
  const value = args.flags[name]
  if (value === true) {
    throw new ValidationError(`--${name} needs a value`)
  }
  return value
}

export const booleanFlag = (args: ParsedArgs, name: string): boolean =>
  args.flags[name] === true || args.flags[name] === 'true'

export const positional = (
  args: ParsedArgs,
  index: number,
  name: string,
): string => {
  const value = args.positionals[index]
  if (value === undefined) {
    throw new ValidationError(`Missing <${name}>`)
  }
  return value
}

/**
 * Reject flags the command does not take, so typos do not pass silently.
 */
export const assertKnownFlags = (args: ParsedArgs, known: string[]): void => {
  const allowed = new Set([...known, 'server', 'help'])
  const unknown = Object.keys(args.flags).filter((flag) => !allowed.has(flag))
  if (unknown.length > 0) {
    throw new ValidationError(
      `Unknown option${unknown.length > 1 ? 's' : ''}: ${unknown.map((flag) => `--${flag}`).join(', ')}`,
    )
  }
}
