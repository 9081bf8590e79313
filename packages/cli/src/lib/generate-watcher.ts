import path from 'node:path'
import { watch } from 'chokidar'
import type { ProjectModel } from '@modforge/core'
import { MODULE_CONFIG_FILE } from './config'
import { generateReadmes } from './generators/readme'
import { cliLogger, type CliLogger } from './helpers/logger'
import type { ProjectResolver } from './resolver'

interface GenerateWatcherOptions {
  resolver: ProjectResolver
  quiet?: boolean
  logger?: CliLogger
  env?: NodeJS.ProcessEnv
  debounceMs?: number
}

export const DEFAULT_DEBOUNCE_MS = 300

/**
 * Files whose change can alter generated output: config files, templates and
 * declared inputs.
 */
export function collectWatchTargets(project: ProjectModel): string[] {
  const targets = new Set<string>([
    ...project.configFiles,
    path.join(project.info.rootDir, '**', MODULE_CONFIG_FILE),
  ])
  const contexts = [project.root, ...project.modules.map((entry) => entry.readme)]
  for (const entry of project.modules) {
    for (const file of entry.configFiles) targets.add(file)
  }
  for (const context of contexts) {
    if (context.template) targets.add(context.template)
    for (const input of context.inputs) targets.add(input)
  }
  return Array.from(targets)
}

export function collectOutputs(project: ProjectModel): Set<string> {
  return new Set([project.root.outputFile, ...project.modules.map((entry) => entry.readme.outputFile)])
}

export async function startGenerateWatcher(options: GenerateWatcherOptions): Promise<() => Promise<void>> {
  const { resolver, quiet = false, env } = options
  const logger = (options.logger ?? cliLogger).withPrefix('watch')
  const rootDir = resolver.getRootDir()
  const debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS

  let project = resolver.loadProject({ env })
  let outputs = collectOutputs(project)
  const watched = new Set(collectWatchTargets(project))

  let debounceTimer: ReturnType<typeof setTimeout> | null = null
  let pendingChanges = new Set<string>()
  let queue: Promise<void> = Promise.resolve()

  const log = (message: string, ...args: unknown[]) => {
    if (!quiet) logger.info(message, ...args)
  }

  const runGeneration = async (changedFiles: Set<string>) => {
    log('Detected changes in %d file(s), regenerating...', changedFiles.size)
    try {
      const result = await generateReadmes({ resolver, quiet: true, logger: options.logger, env })
      project = result.project
      outputs = collectOutputs(project)
      const added = collectWatchTargets(project).filter((target) => !watched.has(target))
      if (added.length) {
        added.forEach((target) => watched.add(target))
        watcher.add(added)
      }
      log('Generated %d file(s)', result.filesWritten.length)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      logger.error('Generation failed: %s', message)
    }
  }

  const scheduleGeneration = (filePath: string) => {
    if (outputs.has(path.resolve(filePath))) return
    pendingChanges.add(filePath)

    if (debounceTimer) {
      clearTimeout(debounceTimer)
    }

    debounceTimer = setTimeout(() => {
      const changes = pendingChanges
      pendingChanges = new Set()
      debounceTimer = null
      queue = queue.then(() => runGeneration(changes))
    }, debounceMs)
  }

  log('Watching %d path(s)', watched.size)

  const watcher = watch(Array.from(watched), {
    persistent: true,
    ignoreInitial: true,
    ignored: ['**/node_modules/**', '**/.git/**', '**/dist/**'],
    awaitWriteFinish: {
      stabilityThreshold: 100,
      pollInterval: 50,
    },
  })

  watcher.on('add', (filePath: string) => {
    log('File added: %s', path.relative(rootDir, filePath))
    scheduleGeneration(filePath)
  })

  watcher.on('change', (filePath: string) => {
    log('File changed: %s', path.relative(rootDir, filePath))
    scheduleGeneration(filePath)
  })

  watcher.on('unlink', (filePath: string) => {
    log('File removed: %s', path.relative(rootDir, filePath))
    scheduleGeneration(filePath)
  })

  watcher.on('error', (error: unknown) => {
    logger.error('Watcher error: %s', error instanceof Error ? error.message : String(error))
  })

  await new Promise<void>((resolve) => {
    watcher.once('ready', () => resolve())
  })

  return async () => {
    if (debounceTimer) {
      clearTimeout(debounceTimer)
    }
    await watcher.close()
    await queue
    log('Watcher stopped')
  }
}
