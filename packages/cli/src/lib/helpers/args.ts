/**
 * CLI Argument Parsing Utilities
 *
 * @example
 * ```ts
 * import { parseCliArgs } from '@modforge/cli/lib/helpers'
 *
 * const { args } = parseCliArgs(rest, {
 *   string: ['root'],
 *   boolean: ['quiet'],
 *   alias: { r: 'root', q: 'quiet' },
 * })
 * ```
 */

export type ParsedArgs = Record<string, string | boolean | string[]>

export interface ParseArgsOptions {
  /** Keys that should be parsed as strings */
  string?: string[]
  /** Keys that should be parsed as booleans */
  boolean?: string[]
  /** Keys that should be parsed as arrays (can be specified multiple times) */
  array?: string[]
  /** Required keys that must be present */
  required?: string[]
  /** Aliases for keys (e.g., { r: 'root' }) */
  alias?: Record<string, string>
}

export interface ParseArgsResult {
  args: ParsedArgs
  /** Positional arguments (non-flag values) */
  positional: string[]
  /** Missing required keys */
  missing: string[]
}

/**
 * Supports `--name=value`, `--name value`, `--flag`, `-n value`, combined
 * short booleans (`-qv`) and positional arguments.
 */
export function parseCliArgs(
  argv: string[],
  options: ParseArgsOptions = {}
): ParseArgsResult {
  const args: ParsedArgs = {}
  const positional: string[] = []
  const missing: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (!arg) continue

    if (arg.startsWith('--')) {
      const longArg = arg.slice(2)
      const equalIndex = longArg.indexOf('=')

      if (equalIndex !== -1) {
        const key = longArg.slice(0, equalIndex)
        const value = longArg.slice(equalIndex + 1)
        setArgValue(args, key, value, options)
      } else {
        const key = longArg
        const nextArg = argv[i + 1]

        if (options.boolean?.includes(key)) {
          args[key] = true
        } else if (nextArg && !nextArg.startsWith('-')) {
          setArgValue(args, key, nextArg, options)
          i++
        } else {
          args[key] = true
        }
      }
      continue
    }

    if (arg.startsWith('-') && arg.length > 1) {
      const shortFlags = arg.slice(1)

      for (let j = 0; j < shortFlags.length; j++) {
        const shortFlag = shortFlags.charAt(j)
        const key = options.alias?.[shortFlag] ?? shortFlag

        if (j === shortFlags.length - 1) {
          // Only the last short flag can take a value
          const nextArg = argv[i + 1]
          if (nextArg && !nextArg.startsWith('-') && !options.boolean?.includes(key)) {
            setArgValue(args, key, nextArg, options)
            i++
          } else {
            args[key] = true
          }
        } else {
          args[key] = true
        }
      }
      continue
    }

    positional.push(arg)
  }

  if (options.required) {
    for (const key of options.required) {
      if (args[key] === undefined) {
        missing.push(key)
      }
    }
  }

  return { args, positional, missing }
}

function setArgValue(
  args: ParsedArgs,
  key: string,
  value: string,
  options: ParseArgsOptions
): void {
  if (options.array?.includes(key)) {
    const existing = args[key]
    if (Array.isArray(existing)) {
      existing.push(value)
    } else {
      args[key] = [value]
    }
  } else {
    args[key] = value
  }
}

/**
 * Last string value given for `key`; booleans (a flag without a value) count as absent.
 */
export function readStringArg(args: ParsedArgs, key: string): string | undefined {
  const value = args[key]
  if (typeof value === 'string') return value
  if (Array.isArray(value)) return value[value.length - 1]
  return undefined
}

/**
 * Build usage string from options
 */
export function buildUsage(command: string, options: ParseArgsOptions): string {
  const parts = [command]

  if (options.required) {
    for (const key of options.required) {
      const aliases = Object.entries(options.alias || {})
        .filter(([, v]) => v === key)
        .map(([k]) => `-${k}`)
      const flags = aliases.length > 0 ? aliases.join('|') : `--${key}`
      parts.push(`<${flags} <${key}>>`)
    }
  }

  if (options.string) {
    for (const key of options.string) {
      if (!options.required?.includes(key)) {
        parts.push(`[--${key} <value>]`)
      }
    }
  }

  if (options.boolean) {
    for (const key of options.boolean) {
      parts.push(`[--${key}]`)
    }
  }

  return parts.join(' ')
}

/**
 * Returns an error message, or null when every required key is present.
 */
export function validateRequiredArgs(
  args: ParsedArgs,
  required: string[]
): string | null {
  const missing = required.filter(key => args[key] === undefined)
  if (missing.length === 0) return null
  return `Missing required arguments: ${missing.map(r => `--${r}`).join(', ')}`
}
