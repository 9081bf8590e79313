import fs from 'node:fs'
import path from 'node:path'
import type { PublicationPlan } from '@modforge/core'
import { CliLogger, cliLogger } from '../lib/helpers'
import { createProjectFixture, type ProjectFixture } from '../lib/__tests__/project-fixture'
import { getCliModules, hasCliModules, maskPlan, registerCliModules, run } from '../modforge'

const argv = (...parts: string[]) => ['node', 'modforge', ...parts]

function createSink() {
  const lines: string[] = []
  return { lines, write: (chunk: string) => lines.push(chunk) }
}

describe('modforge CLI', () => {
  let fixture: ProjectFixture
  let errorSpy: jest.SpyInstance
  let stdoutSpy: jest.SpyInstance

  beforeEach(() => {
    fixture = createProjectFixture('modforge-cli-test-')
    fixture.writeJson('modforge.config.json', {
      name: 'demo',
      version: '2.0.0',
      modules: ['core'],
      publishing: {
        github: { project: 'demo', org: 'example', addToRelease: true },
      },
      properties: { 'publishing.github.user': 'ci', 'publishing.github.token': 'test-token' },
    })
    fixture.write('docs/README-TEMPLATE.md', '# $name\n${modules}')
    fixture.writeJson('core/module.json', { description: 'Core logic' })
    fixture.write('core/docs/README-TEMPLATE.md', '# $name: $description\n')
    errorSpy = jest.spyOn(cliLogger, 'error').mockImplementation(() => undefined)
    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    jest.restoreAllMocks()
    registerCliModules([])
    fixture.cleanup()
  })

  it('generates READMEs for the project given by --root', async () => {
    const code = await run(argv('readme', 'generate', '--root', fixture.rootDir, '--quiet'))

    expect(code).toBe(0)
    expect(fixture.read('core/README.md')).toBe('# core: Core logic\n')
    expect(fixture.read('README.md').startsWith('# demo\n<hr/>\n\n* ### [core](core)\n> Core logic\n')).toBe(true)
  })

  it('prints a single module README without writing it', async () => {
    const code = await run(argv('readme', 'render', '-r', fixture.rootDir, '-m', 'core'))

    expect(code).toBe(0)
    expect(stdoutSpy).toHaveBeenCalledWith('# core: Core logic\n')
    expect(fixture.exists('core/README.md')).toBe(false)
  })

  it('accepts module paths in any normalized spelling', async () => {
    const code = await run(argv('readme', 'render', '--root', fixture.rootDir, '--module', './core/'))

    expect(code).toBe(0)
    expect(stdoutSpy).toHaveBeenCalledWith('# core: Core logic\n')
  })

  it('logs unknown placeholders while rendering a module that asks for warnings', async () => {
    fixture.writeJson('core/module.json', { unknownPlaceholders: 'warn' })
    fixture.write('core/docs/README-TEMPLATE.md', 'x $unknown')
    const output = createSink()
    const forModuleSpy = jest.spyOn(cliLogger, 'forModule').mockImplementation(
      (modulePath: string) => new CliLogger({ colors: false, output, prefix: modulePath })
    )

    const code = await run(argv('readme', 'render', '--root', fixture.rootDir, '--module', 'core'))

    expect(code).toBe(0)
    expect(stdoutSpy).toHaveBeenCalledWith('x $unknown')
    expect(forModuleSpy).toHaveBeenCalledWith('core')
    expect(output.lines).toEqual([
      '⚠️  [core] Unknown placeholder "unknown" left as is in core/docs/README-TEMPLATE.md\n',
    ])
  })

  it('fails render without --module', async () => {
    const code = await run(argv('readme', 'render', '--root', fixture.rootDir))

    expect(code).toBe(1)
    expect(errorSpy).toHaveBeenCalledWith('Failed: %s', expect.stringContaining('Missing required arguments: --module'))
  })

  it('prints the publication plan as JSON with masked tokens', async () => {
    const code = await run(argv('publish', 'plan', '--root', fixture.rootDir, '--json'))

    expect(code).toBe(0)
    const printed = JSON.parse(String(stdoutSpy.mock.calls[0]?.[0]))
    expect(printed).toEqual({
      version: '2.0.0',
      releaseKind: 'production',
      vcs: {
        url: 'https://github.com/example/demo',
        connection: 'scm:git:https://github.com/example/demo.git',
        developerConnection: 'scm:git:https://github.com/example/demo.git',
      },
      repositories: [
        {
          name: 'github',
          url: 'https://maven.pkg.github.com/example/demo',
          addToRelease: true,
          credentials: { user: 'ci', token: '***' },
          releaseTask: 'releaseProductionToGithub',
        },
      ],
    })
  })

  it('prints the publication plan under a header', async () => {
    const infoSpy = jest.spyOn(cliLogger, 'info').mockImplementation(() => undefined)

    const rule = '═'.repeat('Publication plan for demo'.length + 4)

    const code = await run(argv('publish', 'plan', '--root', fixture.rootDir))

    expect(code).toBe(0)
    expect(infoSpy.mock.calls.slice(0, 4)).toEqual([
      [rule],
      ['  Publication plan for demo  '],
      [rule],
      ['Version %s (%s release)', '2.0.0', 'production'],
    ])
    expect(infoSpy).toHaveBeenCalledWith(
      '  • github: https://maven.pkg.github.com/example/demo (credentials set, releaseProductionToGithub)'
    )
  })

  it('writes the project version file', async () => {
    const code = await run(argv('project', 'version', '--root', fixture.rootDir))

    expect(code).toBe(0)
    expect(fs.readFileSync(path.join(fixture.rootDir, 'build', 'project-version.txt'), 'utf8')).toBe('2.0.0')
  })

  it('reports configuration errors with exit code 1', async () => {
    fs.rmSync(path.join(fixture.rootDir, 'modforge.config.json'))

    const code = await run(argv('readme', 'generate', '--root', fixture.rootDir))

    expect(code).toBe(1)
    expect(errorSpy).toHaveBeenCalledWith(
      'Configuration error: %s',
      `No modforge.config.json found in ${fixture.rootDir}`
    )
  })

  it('rejects unknown modules and commands', async () => {
    expect(await run(argv('deploy', 'now'))).toBe(1)
    expect(errorSpy).toHaveBeenCalledWith('Module not found: "%s"', 'deploy')

    expect(await run(argv('readme', 'publish'))).toBe(1)
    expect(errorSpy).toHaveBeenCalledWith('Unknown command "%s". Available: %s', 'publish', 'generate, render, watch, modules')
  })

  it('returns 1 after printing help', async () => {
    expect(await run(argv())).toBe(1)
    expect(await run(argv('--help'))).toBe(1)
  })

  it('dispatches registered command modules', async () => {
    const hello = jest.fn()
    registerCliModules([{ id: 'custom', cli: [{ command: 'hello', run: hello }] }])

    expect(hasCliModules()).toBe(true)
    expect(getCliModules().map((entry) => entry.id)).toEqual(['custom'])
    expect(await run(argv('custom', 'hello', '--name', 'demo'))).toBe(0)
    expect(hello).toHaveBeenCalledWith(['--name', 'demo'])
  })

  it('treats an empty registration as no modules', () => {
    registerCliModules([])
    expect(hasCliModules()).toBe(false)
    expect(getCliModules()).toEqual([])
  })
})

describe('maskPlan', () => {
  it('hides tokens and keeps missing credentials as null', () => {
    const plan: PublicationPlan = {
      version: '1.0.0-SNAPSHOT',
      releaseKind: 'development',
      vcs: null,
      repositories: [
        { name: 'a', url: 'https://a.example.test', addToRelease: true, credentials: { user: 'u', token: 'test-secret' }, releaseTask: 'releaseDevelopmentToA' },
        { name: 'b', url: 'https://b.example.test', addToRelease: false, credentials: null, releaseTask: null },
      ],
    }

    const masked = maskPlan(plan)

    expect(masked.repositories.map((repository) => repository.credentials)).toEqual([{ user: 'u', token: '***' }, null])
    expect(plan.repositories[0]?.credentials?.token).toBe('test-secret')
  })
})
