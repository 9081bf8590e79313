import type { PropertySource } from '@modforge/shared/lib/properties'
import type { PublishingExtension } from '../publishing/extension'
import type { ReadmeContext } from '../readme/context'

export type ProjectInfo = {
  name: string
  group?: string
  version: string
  rootDir: string
}

export type ModuleModel = {
  readme: ReadmeContext
  /** Configuration files this module was loaded from */
  configFiles: string[]
}

export type ProjectModel = {
  info: ProjectInfo
  root: ReadmeContext
  modules: ModuleModel[]
  publishing: PublishingExtension
  properties: PropertySource
  configFiles: string[]
}
