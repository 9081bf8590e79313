export type PropertyValue = string | (() => string)

export type SubstituteOptions = {
  /** Called once per distinct placeholder name that has no registered value */
  onUnknown?: (name: string) => void
}

// `${name}` allows dotted names, bare `$name` stops at the first non-word character
const PLACEHOLDER_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_.]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g

export function resolvePropertyValue(value: PropertyValue): string {
  return typeof value === 'function' ? value() : value
}

/**
 * Replaces `$name` and `${name}` tokens in a single left-to-right pass.
 * Substituted text is never rescanned. Unknown tokens stay verbatim.
 */
export function substitutePlaceholders(
  template: string,
  properties: ReadonlyMap<string, PropertyValue>,
  options: SubstituteOptions = {}
): string {
  const resolved = new Map<string, string>()
  const reported = new Set<string>()

  return template.replace(PLACEHOLDER_PATTERN, (token: string, braced?: string, bare?: string) => {
    const name = braced ?? bare ?? ''
    const value = properties.get(name)
    if (value === undefined) {
      if (!reported.has(name)) {
        reported.add(name)
        options.onUnknown?.(name)
      }
      return token
    }
    let text = resolved.get(name)
    if (text === undefined) {
      text = resolvePropertyValue(value)
      resolved.set(name, text)
    }
    return text
  })
}

export function listPlaceholders(template: string): string[] {
  const names = new Set<string>()
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1] ?? match[2]
    if (name) names.add(name)
  }
  return Array.from(names)
}
