import path from 'node:path'
import { isConfigurationError } from '@modforge/shared/lib/errors'
import { parseBooleanFlag } from '@modforge/shared/lib/boolean'
import { writeVersionFile, type PublicationPlan } from '@modforge/core'
import { getCliModules, type CliModule } from './registry'
import {
  buildUsage,
  cliLogger,
  parseCliArgs,
  readStringArg,
  validateRequiredArgs,
  type ParseArgsOptions,
} from './lib/helpers'
import { createResolver, normalizeModulePath } from './lib/resolver'

export { registerCliModules, getCliModules, hasCliModules } from './registry'

const COMMON_ARGS: ParseArgsOptions = {
  string: ['root'],
  boolean: ['quiet', 'json'],
  alias: { r: 'root', q: 'quiet' },
}

const RENDER_ARGS: ParseArgsOptions = {
  ...COMMON_ARGS,
  string: ['root', 'module'],
  required: ['module'],
  alias: { r: 'root', m: 'module' },
}

function resolverFor(args: string[], options: ParseArgsOptions = COMMON_ARGS) {
  const parsed = parseCliArgs(args, options)
  const root = readStringArg(parsed.args, 'root')
  return { resolver: createResolver(root ? path.resolve(root) : process.cwd()), ...parsed }
}

export function maskPlan(plan: PublicationPlan): PublicationPlan {
  return {
    ...plan,
    repositories: plan.repositories.map((repository) => ({
      ...repository,
      credentials: repository.credentials ? { user: repository.credentials.user, token: '***' } : null,
    })),
  }
}

function waitForShutdown(): Promise<string> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'))
    process.once('SIGTERM', () => resolve('SIGTERM'))
  })
}

export const builtinModules: CliModule[] = [
  {
    id: 'readme',
    cli: [
      {
        command: 'generate',
        description: 'Render module READMEs and the root feature matrix',
        run: async (args) => {
          const { resolver, args: parsed } = resolverFor(args)
          const { generateReadmes } = await import('./lib/generators/readme')
          const result = await generateReadmes({ resolver, quiet: parseBooleanFlag(parsed.quiet) })
          cliLogger.info(
            'Wrote %d README file(s), skipped %d without a template',
            result.filesWritten.length,
            result.skipped.length
          )
        },
      },
      {
        command: 'render',
        description: 'Print one module README without writing it',
        run: async (args) => {
          const { resolver, args: parsed } = resolverFor(args, RENDER_ARGS)
          const problem = validateRequiredArgs(parsed, RENDER_ARGS.required ?? [])
          if (problem) {
            throw new Error(`${problem}\nUsage: ${buildUsage('modforge readme render', RENDER_ARGS)}`)
          }
          const modulePath = normalizeModulePath(readStringArg(parsed, 'module') ?? '')
          const project = resolver.loadProject()
          const target = project.modules.find((candidate) => candidate.readme.path === modulePath)
          if (!target) {
            throw new Error(`Module "${modulePath}" is not part of ${project.info.name}`)
          }
          const { createRenderOptions } = await import('./lib/generators/readme')
          const content = target.readme.render(createRenderOptions(resolver.getRootDir(), cliLogger))
          if (content === null) {
            cliLogger.warn('Module "%s" has no README template', modulePath)
            return
          }
          process.stdout.write(content)
        },
      },
      {
        command: 'watch',
        description: 'Regenerate READMEs when templates, inputs or config change',
        run: async (args) => {
          const { resolver, args: parsed } = resolverFor(args)
          const quiet = parseBooleanFlag(parsed.quiet)
          const { generateReadmes } = await import('./lib/generators/readme')
          const { startGenerateWatcher } = await import('./lib/generate-watcher')
          await generateReadmes({ resolver, quiet })
          const stop = await startGenerateWatcher({ resolver, quiet })
          const signal = await waitForShutdown()
          cliLogger.info('Received %s, stopping watcher', signal)
          await stop()
        },
      },
      {
        command: 'modules',
        description: 'List modules in aggregation order',
        run: async (args) => {
          const { resolver } = resolverFor(args)
          const project = resolver.loadProject()
          if (project.modules.length === 0) {
            cliLogger.info('No modules in %s', project.info.name)
            return
          }
          cliLogger.list(
            project.modules.map(({ readme }) => {
              const features = readme.features.size
              return `${readme.path} [${readme.maturity}] ${features} feature${features === 1 ? '' : 's'}`
            })
          )
        },
      },
    ],
  },
  {
    id: 'publish',
    cli: [
      {
        command: 'plan',
        description: 'Show publishing targets and credential status',
        run: async (args) => {
          const { resolver, args: parsed } = resolverFor(args)
          const project = resolver.loadProject()
          const plan = maskPlan(project.publishing.plan())
          if (parseBooleanFlag(parsed.json)) {
            process.stdout.write(JSON.stringify(plan, null, 2) + '\n')
            return
          }
          cliLogger.header(`Publication plan for ${project.info.name}`)
          cliLogger.info('Version %s (%s release)', plan.version, plan.releaseKind)
          cliLogger.info('VCS: %s', plan.vcs?.url ?? 'not configured')
          if (plan.repositories.length === 0) {
            cliLogger.info('No publishing repositories configured')
            return
          }
          cliLogger.list(
            plan.repositories.map((repository) => {
              const credentials = repository.credentials ? 'credentials set' : 'credentials missing'
              const release = repository.releaseTask ?? 'not in release'
              return `${repository.name}: ${repository.url} (${credentials}, ${release})`
            })
          )
          for (const repository of plan.repositories) {
            if (!repository.credentials) {
              cliLogger.warn(
                'Repository "%s" has no credentials: set publishing.%s.user and publishing.%s.token',
                repository.name,
                repository.name,
                repository.name
              )
            }
          }
        },
      },
    ],
  },
  {
    id: 'project',
    cli: [
      {
        command: 'version',
        description: 'Write build/project-version.txt',
        run: async (args) => {
          const { resolver } = resolverFor(args)
          const project = resolver.loadProject()
          const file = writeVersionFile(project.info.rootDir, project.info.version)
          cliLogger.success('Version %s written to %s', project.info.version, path.relative(process.cwd(), file) || file)
          if (project.publishing.releaseKind() === 'development') {
            cliLogger.warn('%s is a development version', project.info.version)
          }
        },
      },
    ],
  },
]

function printHelp(all: CliModule[]) {
  const pad = (s: string) => `  ${s}`
  cliLogger.info(pad('Usage: modforge <module> <command> [--root <dir>] [args]'))
  const list = all
    .filter((m) => m.cli.length)
    .flatMap((m) =>
      m.cli.map((c) => `• ${m.id} ${c.command}${c.description ? ` - ${c.description}` : ''}`)
    )
  if (list.length) {
    cliLogger.info(pad('Available:'))
    cliLogger.list(list)
  } else {
    cliLogger.info(pad('No CLI commands available'))
  }
}

export async function run(argv = process.argv): Promise<number> {
  const [, , ...parts] = argv
  const [modName, cmdName, ...rest] = parts
  const all = [...builtinModules, ...getCliModules()]

  if (!modName || modName === 'help' || modName === '--help' || modName === '-h') {
    printHelp(all)
    return 1
  }

  const mod = all.find((m) => m.id === modName)
  if (!mod) {
    cliLogger.error('Module not found: "%s"', modName)
    return 1
  }
  if (mod.cli.length === 0) {
    cliLogger.error('Module "%s" has no CLI commands', modName)
    return 1
  }
  if (!cmdName) {
    cliLogger.info('Commands for "%s": %s', modName, mod.cli.map((c) => c.command).join(', '))
    return 1
  }
  const cmd = mod.cli.find((c) => c.command === cmdName)
  if (!cmd) {
    cliLogger.error('Unknown command "%s". Available: %s', cmdName, mod.cli.map((c) => c.command).join(', '))
    return 1
  }

  const started = Date.now()
  cliLogger.debug('Running %s:%s %s', modName, cmdName, rest.join(' '))
  try {
    await cmd.run(rest)
    cliLogger.debug('Done in %dms', Date.now() - started)
    return 0
  } catch (error: unknown) {
    if (isConfigurationError(error)) {
      cliLogger.error('Configuration error: %s', error.message)
      if (error.hint) cliLogger.info(error.hint)
      return 1
    }
    cliLogger.error('Failed: %s', error instanceof Error ? error.message : String(error))
    return 1
  }
}
