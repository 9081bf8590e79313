import { toEnvKey, trimToUndefined } from './string'

export interface PropertySource {
  get(key: string): string | undefined
}

export type PropertySourceOptions = {
  properties?: Record<string, string>
  env?: NodeJS.ProcessEnv
}

/**
 * Looks a project property up in the configured map first, then in the
 * environment under the exact key, then under its upper-snake-case form.
 */
export function createPropertySource(options: PropertySourceOptions = {}): PropertySource {
  const properties = options.properties ?? {}
  const env = options.env ?? process.env

  return {
    get: (key: string) => {
      const configured = trimToUndefined(properties[key])
      if (configured) return configured
      const exact = trimToUndefined(env[key])
      if (exact) return exact
      return trimToUndefined(env[toEnvKey(key)])
    },
  }
}
