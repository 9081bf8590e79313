import fs from 'node:fs'
import type { ReadmeContext } from './context'
import { substitutePlaceholders } from './template'

export type RenderOptions = {
  /** Receives unknown placeholder names when the context's policy is `warn` */
  onUnknownPlaceholder?: (name: string, context: ReadmeContext) => void
}

export function templateExists(file: string | null): file is string {
  if (!file) return false
  return fs.statSync(file, { throwIfNoEntry: false })?.isFile() ?? false
}

export function readTemplate(file: string | null): string | null {
  if (!templateExists(file)) return null
  return fs.readFileSync(file, 'utf8')
}

/**
 * Renders a module README. A missing template is not an error: the result is
 * `null` and the caller skips the module.
 */
export function renderReadme(context: ReadmeContext, options: RenderOptions = {}): string | null {
  const template = readTemplate(context.template)
  if (template === null) return null

  const report = context.unknownPlaceholders === 'warn' ? options.onUnknownPlaceholder : undefined
  return substitutePlaceholders(template, context.getProperties(), {
    onUnknown: report ? (name) => report(name, context) : undefined,
  })
}
