/**
 * Raised when the project configuration cannot be used as written.
 * Configuration errors abort the whole run; nothing is generated or planned
 * after one is thrown.
 */
export class ConfigurationError extends Error {
  hint?: string

  constructor(message: string, hint?: string) {
    super(message)
    this.name = 'ConfigurationError'
    this.hint = hint
  }
}

export function missingPrerequisite(step: string, hint?: string): ConfigurationError {
  return new ConfigurationError(`Missing prerequisite: ${step}`, hint)
}

export function invalidConfig(file: string, details: string): ConfigurationError {
  return new ConfigurationError(`Invalid configuration in ${file}: ${details}`)
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}
