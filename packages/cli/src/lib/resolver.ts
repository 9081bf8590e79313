import fs from 'node:fs'
import path from 'node:path'
import {
  DEFAULT_SONATYPE_ROOT,
  parseMaturity,
  PublishingExtension,
  ReadmeContext,
  type ModuleModel,
  type ProjectInfo,
  type ProjectModel,
} from '@modforge/core'
import { ConfigurationError } from '@modforge/shared/lib/errors'
import { createPropertySource } from '@modforge/shared/lib/properties'
import { trimToUndefined } from '@modforge/shared/lib/string'
import {
  MODULE_CONFIG_FILE,
  moduleConfigSchema,
  parseConfig,
  PROJECT_CONFIG_FILE,
  projectConfigSchema,
  readConfigFile,
  type ModuleConfig,
  type PublishingConfig,
  type ReadmeConfig,
} from './config'

const SKIPPED_DIRS = new Set(['node_modules', 'dist', 'build', 'coverage'])

export type LoadProjectOptions = {
  env?: NodeJS.ProcessEnv
}

export interface ProjectResolver {
  getRootDir(): string
  hasConfig(): boolean
  /** Declared module paths, or every directory holding a module.json */
  listModulePaths(): string[]
  loadProject(options?: LoadProjectOptions): ProjectModel
}

/**
 * `./libs\\extra/` -> `libs/extra`. Paths escaping the root are rejected.
 */
export function normalizeModulePath(raw: string): string {
  const segments = raw
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment && segment !== '.')
  if (path.isAbsolute(raw) || segments.includes('..') || segments.length === 0) {
    throw new ConfigurationError(
      `Invalid module path "${raw}"`,
      'Module paths are relative to the project root and stay inside it.'
    )
  }
  return segments.join('/')
}

function discoverModulePaths(rootDir: string, rel: string[] = []): string[] {
  const found: string[] = []
  const dir = path.join(rootDir, ...rel)
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue
    if (entry.name.startsWith('.') || SKIPPED_DIRS.has(entry.name)) continue
    const childRel = [...rel, entry.name]
    if (fs.existsSync(path.join(rootDir, ...childRel, MODULE_CONFIG_FILE))) {
      found.push(childRel.join('/'))
    }
    found.push(...discoverModulePaths(rootDir, childRel))
  }
  return found
}

export function applyReadmeConfig(context: ReadmeContext, config: ReadmeConfig): void {
  context.description = trimToUndefined(config.description)
  context.maturity = parseMaturity(config.maturity)
  if (config.template !== undefined) {
    context.setTemplate(config.template)
  }
  for (const input of config.inputs) {
    context.addInput(input)
  }
  for (const [name, value] of Object.entries(config.properties)) {
    context.property(name, value)
  }
  for (const feature of config.features) {
    context.feature(feature.key, feature.content, feature.id)
  }
  context.unknownPlaceholders = config.unknownPlaceholders
}

/**
 * Applied in a fixed order (vcs, github, repositories, sonatype) so the VCS
 * precondition is checked the same way for every config file.
 */
export function applyPublishingConfig(publishing: PublishingExtension, config: PublishingConfig): void {
  if (config.vcs) {
    const { url, ...options } = config.vcs
    publishing.vcs(url, options)
  }
  if (config.github) {
    publishing.github(config.github.project, {
      org: config.github.org,
      addToRelease: config.github.addToRelease,
    })
  }
  for (const repository of config.repositories) {
    publishing.repository(repository.name, repository.url, { addToRelease: repository.addToRelease })
  }
  if (config.sonatype) {
    publishing.sonatype(config.sonatype.root ?? DEFAULT_SONATYPE_ROOT)
  }
}

export function createResolver(cwd: string = process.cwd()): ProjectResolver {
  const rootDir = path.resolve(cwd)
  const configPath = path.join(rootDir, PROJECT_CONFIG_FILE)

  const readProjectConfig = () => {
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError(
        `No ${PROJECT_CONFIG_FILE} found in ${rootDir}`,
        'Create one with at least "name" and "version", or pass --root.'
      )
    }
    return readConfigFile(configPath, projectConfigSchema)
  }

  const listModulePaths = (declared?: string[]): string[] => {
    if (!declared) {
      return discoverModulePaths(rootDir).sort((a, b) => a.localeCompare(b))
    }
    const seen = new Set<string>()
    return declared.map((raw) => {
      const modulePath = normalizeModulePath(raw)
      if (seen.has(modulePath)) {
        throw new ConfigurationError(`Module "${modulePath}" is declared more than once in ${configPath}`)
      }
      seen.add(modulePath)
      return modulePath
    })
  }

  const getModuleDir = (modulePath: string) => path.join(rootDir, ...modulePath.split('/'))

  const loadModule = (
    modulePath: string,
    info: ProjectInfo,
    isPublished: () => boolean
  ): ModuleModel => {
    const dir = getModuleDir(modulePath)
    if (!fs.statSync(dir, { throwIfNoEntry: false })?.isDirectory()) {
      throw new ConfigurationError(`Module "${modulePath}" not found at ${dir}`)
    }
    const configFile = path.join(dir, MODULE_CONFIG_FILE)
    const config: ModuleConfig = fs.existsSync(configFile)
      ? readConfigFile(configFile, moduleConfigSchema)
      : parseConfig(configFile, moduleConfigSchema, {})

    const segments = modulePath.split('/')
    const readme = new ReadmeContext({
      name: config.name ?? segments[segments.length - 1] ?? modulePath,
      path: modulePath,
      dir,
      project: info,
      isPublished,
    })
    applyReadmeConfig(readme, config)
    return { readme, configFiles: [configFile] }
  }

  return {
    getRootDir: () => rootDir,

    hasConfig: () => fs.existsSync(configPath),

    listModulePaths: () => listModulePaths(readProjectConfig().modules),

    loadProject: (options: LoadProjectOptions = {}) => {
      const config = readProjectConfig()
      const info: ProjectInfo = {
        name: config.name,
        group: config.group,
        version: config.version,
        rootDir,
      }
      const properties = createPropertySource({ properties: config.properties, env: options.env })
      const publishing = new PublishingExtension(info, properties)
      applyPublishingConfig(publishing, config.publishing ?? { repositories: [] })

      const isPublished = () => publishing.hasRepositories()
      const root = new ReadmeContext({ name: config.name, dir: rootDir, project: info, isPublished })
      if (config.readme) applyReadmeConfig(root, config.readme)

      const modules = listModulePaths(config.modules).map((modulePath) =>
        loadModule(modulePath, info, isPublished)
      )

      return { info, root, modules, publishing, properties, configFiles: [configPath] }
    },
  }
}
