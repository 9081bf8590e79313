export { FeatureRegistry, DEFAULT_ITEM_PREFIX, type Feature } from './features/registry'
export {
  ReadmeContext,
  README_FILE,
  DEFAULT_TEMPLATE_SEGMENTS,
  type ReadmeContextOptions,
  type UnknownPlaceholderPolicy,
} from './readme/context'
export { renderReadme, readTemplate, templateExists, type RenderOptions } from './readme/renderer'
export { substitutePlaceholders, listPlaceholders, resolvePropertyValue, type PropertyValue } from './readme/template'
export {
  renderModuleBlock,
  buildModulesSummary,
  renderAggregate,
  MODULE_SEPARATOR,
  MODULE_ITEM_PREFIX,
  type AggregatedModule,
} from './readme/aggregate'
export { MATURITY_LEVELS, DEFAULT_MATURITY, parseMaturity, isMaturity, type Maturity } from './readme/maturity'
export { isInDevelopment, writeVersionFile, versionFilePath } from './project/version'
export type { ProjectInfo, ModuleModel, ProjectModel } from './project/types'
export {
  PublishingExtension,
  PUBLISHING_NAMESPACE,
  DEFAULT_SONATYPE_ROOT,
  credentialKeys,
  releaseTaskName,
  type VcsInfo,
  type VcsOptions,
  type GithubOptions,
  type RepositoryOptions,
  type PublishingRepository,
  type RepositoryCredentials,
  type PlannedRepository,
  type PublicationPlan,
  type ReleaseKind,
} from './publishing/extension'
