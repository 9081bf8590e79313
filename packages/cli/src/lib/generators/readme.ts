import fs from 'node:fs'
import path from 'node:path'
import { renderAggregate, type ProjectModel, type RenderOptions } from '@modforge/core'
import type { ProjectResolver } from '../resolver'
import { cliLogger, type CliLogger } from '../helpers/logger'

export interface ReadmeGeneratorOptions {
  resolver: ProjectResolver
  quiet?: boolean
  logger?: CliLogger
  env?: NodeJS.ProcessEnv
}

export type GeneratorResult = {
  project: ProjectModel
  filesWritten: string[]
  /** Module paths skipped because they have no template; `''` is the root */
  skipped: string[]
}

/**
 * Routes unknown placeholder reports to the module's logger.
 */
export function createRenderOptions(rootDir: string, logger: CliLogger): RenderOptions {
  return {
    onUnknownPlaceholder: (name, context) => {
      const template = context.template ? path.relative(rootDir, context.template) || context.template : '(no template)'
      logger.forModule(context.path).warn('Unknown placeholder "%s" left as is in %s', name, template)
    },
  }
}

/**
 * Renders every module README, then the root README with the aggregated
 * module summary. Modules without a template are skipped, not failed.
 */
export async function generateReadmes(options: ReadmeGeneratorOptions): Promise<GeneratorResult> {
  const { resolver, quiet = false } = options
  const logger = options.logger ?? cliLogger
  const rootDir = resolver.getRootDir()
  const project = resolver.loadProject({ env: options.env })

  const filesWritten: string[] = []
  const skipped: string[] = []
  const relative = (file: string) => path.relative(rootDir, file) || file
  const renderOptions = createRenderOptions(rootDir, logger)

  const write = (file: string, content: string) => {
    fs.writeFileSync(file, content)
    filesWritten.push(file)
    if (!quiet) logger.success('Generated %s', relative(file))
  }

  for (const { readme } of project.modules) {
    const content = readme.render(renderOptions)
    if (content === null) {
      skipped.push(readme.path)
      if (!quiet) logger.forModule(readme.path).debug('No README template, skipping')
      continue
    }
    write(readme.outputFile, content)
  }

  const rootContent = renderAggregate(
    project.root,
    project.modules.map((entry) => entry.readme),
    renderOptions
  )
  if (rootContent === null) {
    skipped.push(project.root.path)
    if (!quiet) logger.debug('No root README template, skipping module summary')
  } else {
    write(project.root.outputFile, rootContent)
  }

  return { project, filesWritten, skipped }
}
