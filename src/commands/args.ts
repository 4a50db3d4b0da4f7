import { UsageError } from '../errors'

export interface ArgSpec {
  /** Options that take a value, e.g. `--output_csv <file>` or `--output_csv=<file>` */
  values?: string[]
  /** Options that take no value */
  flags?: string[]
}

export interface ParsedArgs {
  positionals: string[]
  values: Map<string, string>
  flags: Set<string>
}

/**
 * Split command arguments into positionals and known options.
 * Anything after `--` is positional.
 */
export function parseArgs(args: string[], spec: ArgSpec = {}): ParsedArgs {
  const valueNames = new Set(spec.values ?? [])
  const flagNames = new Set(spec.flags ?? [])
  const parsed: ParsedArgs = { positionals: [], values: new Map(), flags: new Set() }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    if (arg === '--') {
      parsed.positionals.push(...args.slice(i + 1))
      break
    }

    if (!arg.startsWith('-') || arg === '-') {
      parsed.positionals.push(arg)
      continue
    }

    const eq = arg.indexOf('=')
    const name = eq === -1 ? arg : arg.slice(0, eq)

    if (valueNames.has(name)) {
      const value = eq === -1 ? args[++i] : arg.slice(eq + 1)
      if (value === undefined || value === '') {
        throw new UsageError(`Option ${name} requires a value`)
      }
      parsed.values.set(name, value)
    } else if (flagNames.has(name) && eq === -1) {
      parsed.flags.add(name)
    } else {
      throw new UsageError(`Unknown option: ${arg}`)
    }
  }

  return parsed
}

/**
 * First value given under any of the names (aliases of one option).
 */
export function getValue(parsed: ParsedArgs, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = parsed.values.get(name)
    if (value !== undefined) return value
  }
  return undefined
}

export function parsePositiveInt(option: string, value: string): number {
  const parsed = Number(value)
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new UsageError(`${option} must be a positive integer, got "${value}"`)
  }
  return parsed
}
