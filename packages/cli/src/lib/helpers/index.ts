/**
 * CLI Helpers - argument parsing and logging shared by modforge commands.
 *
 * @example
 * ```ts
 * import { parseCliArgs, cliLogger } from '@modforge/cli/lib/helpers'
 * ```
 */

export {
  parseCliArgs,
  buildUsage,
  validateRequiredArgs,
  readStringArg,
  type ParsedArgs,
  type ParseArgsOptions,
  type ParseArgsResult,
} from './args'

export {
  cliLogger,
  CliLogger,
  loggerOptionsFromEnv,
  isLogLevel,
  type LogLevel,
  type LogOutput,
  type LoggerOptions,
} from './logger'
