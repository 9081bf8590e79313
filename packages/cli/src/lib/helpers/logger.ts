/**
 * CLI Logger Utilities
 *
 * Centralized logging for modforge commands with consistent formatting,
 * log levels, and color support.
 *
 * @example
 * ```ts
 * import { cliLogger } from '@modforge/cli/lib/helpers'
 *
 * cliLogger.info('Rendering %d modules', 3)
 * cliLogger.forModule('core').success('README.md written')
 * ```
 */

import { format } from 'node:util'
import { parseBooleanWithDefault } from '@modforge/shared/lib/boolean'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success'

export type LogOutput = {
  write(chunk: string): unknown
}

export interface LoggerOptions {
  /** Minimum log level to display */
  level?: LogLevel
  /** Enable/disable colors */
  colors?: boolean
  /** Custom prefix for all messages */
  prefix?: string
  /** Output for everything below `error` (default: process.stdout) */
  output?: LogOutput
  /** Output for errors (default: process.stderr) */
  errorOutput?: LogOutput
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
}

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  success: 1,
}

const LEVEL_ICONS: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '❌',
  success: '✅',
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  success: COLORS.green,
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_WEIGHTS, value)
}

/**
 * Reads `MODFORGE_LOG_LEVEL`, `MODFORGE_COLORS` and `NO_COLOR`.
 */
export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const rawLevel = env.MODFORGE_LOG_LEVEL?.trim().toLowerCase()
  const options: LoggerOptions = {
    colors: !env.NO_COLOR && parseBooleanWithDefault(env.MODFORGE_COLORS, true),
  }
  if (isLogLevel(rawLevel)) options.level = rawLevel
  return options
}

export class CliLogger {
  private readonly options: Required<LoggerOptions>

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level ?? 'info',
      colors: options.colors ?? true,
      prefix: options.prefix ?? '',
      output: options.output ?? process.stdout,
      errorOutput: options.errorOutput ?? process.stderr,
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_WEIGHTS[level] >= LEVEL_WEIGHTS[this.options.level]
  }

  /**
   * Format a log message
   */
  private format(level: LogLevel, message: string): string {
    const parts: string[] = []

    const icon = LEVEL_ICONS[level]
    const color = this.options.colors ? LEVEL_COLORS[level] : ''
    const reset = this.options.colors ? COLORS.reset : ''
    parts.push(`${color}${icon}${reset}`)

    if (this.options.prefix) {
      parts.push(`[${this.options.prefix}]`)
    }

    parts.push(message)

    return parts.join(' ')
  }

  private write(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return

    const formatted = this.format(level, message)
    const output = level === 'error' ? this.options.errorOutput : this.options.output
    output.write(formatted + '\n')
  }

  /**
   * Log a debug message
   */
  debug(message: string, ...args: unknown[]): void {
    this.write('debug', format(message, ...args))
  }

  /**
   * Log an info message
   */
  info(message: string, ...args: unknown[]): void {
    this.write('info', format(message, ...args))
  }

  /**
   * Log a warning message
   */
  warn(message: string, ...args: unknown[]): void {
    this.write('warn', format(message, ...args))
  }

  /**
   * Log an error message
   */
  error(message: string, ...args: unknown[]): void {
    this.write('error', format(message, ...args))
  }

  /**
   * Log a success message
   */
  success(message: string, ...args: unknown[]): void {
    this.write('success', format(message, ...args))
  }

  /**
   * Create a new logger with a specific prefix
   */
  withPrefix(prefix: string): CliLogger {
    return new CliLogger({
      ...this.options,
      prefix: this.options.prefix ? `${this.options.prefix}:${prefix}` : prefix,
    })
  }

  /**
   * Create a new logger for a module path; the project root is labelled `root`
   */
  forModule(module: string): CliLogger {
    return this.withPrefix(module || 'root')
  }

  /**
   * Log a section header
   */
  header(title: string): void {
    const line = '═'.repeat(title.length + 4)
    this.info(line)
    this.info(`  ${title}  `)
    this.info(line)
  }

  /**
   * Log a list of items
   */
  list(items: string[], options: { bullet?: string; indent?: number } = {}): void {
    const bullet = options.bullet ?? '  •'
    const indent = ' '.repeat(options.indent ?? 0)
    for (const item of items) {
      this.info(`${indent}${bullet} ${item}`)
    }
  }
}

export const cliLogger = new CliLogger(loggerOptionsFromEnv())
