import { ConfigurationError } from '@modforge/shared/lib/errors'

export const MATURITY_LEVELS = ['PROTOTYPE', 'EXPERIMENTAL', 'DEVELOPMENT', 'STABLE', 'DEPRECATED'] as const

export type Maturity = (typeof MATURITY_LEVELS)[number]

export const DEFAULT_MATURITY: Maturity = 'EXPERIMENTAL'

export function isMaturity(value: string): value is Maturity {
  return (MATURITY_LEVELS as readonly string[]).includes(value)
}

export function parseMaturity(raw: string | null | undefined): Maturity {
  if (raw === null || raw === undefined || !raw.trim()) return DEFAULT_MATURITY
  const normalized = raw.trim().toUpperCase()
  if (isMaturity(normalized)) return normalized
  throw new ConfigurationError(
    `Unknown maturity "${raw}"`,
    `Use one of: ${MATURITY_LEVELS.map((level) => level.toLowerCase()).join(', ')}`
  )
}
