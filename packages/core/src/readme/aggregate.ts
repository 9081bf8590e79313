import type { ReadmeContext } from './context'
import { renderReadme, templateExists, type RenderOptions } from './renderer'

export const MODULE_SEPARATOR = '<hr/>'
export const MODULE_ITEM_PREFIX = '> - '

export type AggregatedModule = Pick<ReadmeContext, 'name' | 'path' | 'description' | 'maturity' | 'features'>

export function renderModuleBlock(entry: AggregatedModule): string {
  const lines = [MODULE_SEPARATOR, '', `* ### [${entry.name}](${entry.path})`]
  const description = entry.description?.trim()
  if (description) lines.push(`> ${description}`)
  lines.push('>', `> **Maturity**: ${entry.maturity}`)

  const featureString = entry.features.serialize(MODULE_ITEM_PREFIX, `${entry.path}/`)
  if (featureString) {
    lines.push('>', '> **Features:**', featureString)
  }
  return lines.map((line) => `${line}\n`).join('')
}

/**
 * Module blocks in the order given, closed by a trailing separator.
 */
export function buildModulesSummary(modules: readonly AggregatedModule[]): string {
  if (modules.length === 0) return ''
  return modules.map(renderModuleBlock).join('') + `${MODULE_SEPARATOR}\n`
}

export function renderAggregate(
  root: ReadmeContext,
  modules: readonly AggregatedModule[],
  options?: RenderOptions
): string | null {
  if (!templateExists(root.template)) return null
  root.property('modules', buildModulesSummary(modules))
  return renderReadme(root, options)
}
