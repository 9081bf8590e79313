import path from 'node:path'
import { FeatureRegistry } from '../features/registry'
import { DEFAULT_MATURITY, type Maturity } from './maturity'
import { renderReadme, type RenderOptions } from './renderer'
import type { PropertyValue } from './template'
import type { ProjectInfo } from '../project/types'

export type UnknownPlaceholderPolicy = 'ignore' | 'warn'

export const DEFAULT_TEMPLATE_SEGMENTS = ['docs', 'README-TEMPLATE.md'] as const
export const README_FILE = 'README.md'

export type ReadmeContextOptions = {
  name: string
  /** Module path relative to the project root, `/`-separated; empty for the root */
  path?: string
  dir: string
  project: ProjectInfo
  /** Reports whether the project publishes anywhere; backs the `published` property */
  isPublished?: () => boolean
}

/**
 * Per-module README settings. Mutated while the project is configured and
 * consumed by `render()`.
 */
export class ReadmeContext {
  readonly name: string
  readonly path: string
  readonly dir: string
  readonly features = new FeatureRegistry()
  readonly inputs: string[] = []
  description?: string
  maturity: Maturity = DEFAULT_MATURITY
  template: string | null
  unknownPlaceholders: UnknownPlaceholderPolicy = 'ignore'

  private readonly properties = new Map<string, PropertyValue>()

  constructor(options: ReadmeContextOptions) {
    this.name = options.name
    this.path = options.path ?? ''
    this.dir = options.dir
    this.template = path.join(this.dir, ...DEFAULT_TEMPLATE_SEGMENTS)

    const project = options.project
    const isPublished = options.isPublished ?? (() => false)
    this.property('name', () => this.name)
    this.property('group', () => project.group ?? '')
    this.property('version', () => project.version)
    this.property('description', () => this.description ?? '')
    this.property('maturity', () => this.maturity)
    this.property('features', () => this.features.serialize())
    this.property('modules', '')
    this.property('published', () => String(isPublished()))
  }

  property(name: string, value: PropertyValue): void {
    this.properties.set(name, value)
  }

  getProperties(): ReadonlyMap<string, PropertyValue> {
    return this.properties
  }

  feature(key: string, content: string, id?: string): void {
    this.features.register(key, content, id)
  }

  /** Relative paths resolve against the module directory; `null` disables rendering */
  setTemplate(file: string | null): void {
    this.template = file === null ? null : path.resolve(this.dir, file)
  }

  addInput(file: string): void {
    const resolved = path.resolve(this.dir, file)
    if (!this.inputs.includes(resolved)) this.inputs.push(resolved)
  }

  get outputFile(): string {
    return path.join(this.dir, README_FILE)
  }

  render(options?: RenderOptions): string | null {
    return renderReadme(this, options)
  }
}
