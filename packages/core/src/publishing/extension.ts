import { parseBooleanToken } from '@modforge/shared/lib/boolean'
import { missingPrerequisite } from '@modforge/shared/lib/errors'
import type { PropertySource } from '@modforge/shared/lib/properties'
import { capitalize } from '@modforge/shared/lib/string'
import { isInDevelopment } from '../project/version'
import type { ProjectInfo } from '../project/types'

export const PUBLISHING_NAMESPACE = 'publishing'
export const DEFAULT_SCM_PREFIX = 'scm:git:'
export const DEFAULT_SONATYPE_ROOT = 'https://s01.oss.sonatype.org'

export type VcsInfo = {
  url: string
  connection?: string
  developerConnection?: string
}

export type VcsOptions = {
  /** URL of the Git repository */
  connection?: string
  /** Defaults to `connection` */
  developerConnection?: string
  prefix?: string
}

export type GithubOptions = {
  org: string
  addToRelease?: boolean
}

export type RepositoryOptions = {
  addToRelease?: boolean
}

export type PublishingRepository = {
  name: string
  url: string
  addToRelease: boolean
}

export type RepositoryCredentials = {
  user: string
  token: string
}

export type ReleaseKind = 'development' | 'production'

export type PlannedRepository = PublishingRepository & {
  credentials: RepositoryCredentials | null
  releaseTask: string | null
}

export type PublicationPlan = {
  version: string
  releaseKind: ReleaseKind
  vcs: VcsInfo | null
  repositories: PlannedRepository[]
}

export function credentialKeys(repositoryName: string): { user: string; token: string } {
  return {
    user: `${PUBLISHING_NAMESPACE}.${repositoryName}.user`,
    token: `${PUBLISHING_NAMESPACE}.${repositoryName}.token`,
  }
}

export function releaseTaskName(kind: ReleaseKind, repositoryName: string): string {
  return `release${capitalize(kind)}To${capitalize(repositoryName)}`
}

/**
 * Collects VCS coordinates and target repositories for publishing.
 *
 * VCS information is set once: later `vcs()` calls are no-ops. Repositories
 * can only be added after the VCS is known.
 */
export class PublishingExtension {
  private isVcsInitialized = false
  private vcsInfo: VcsInfo | null = null
  private readonly repositories = new Map<string, PublishingRepository>()

  constructor(
    private readonly project: Pick<ProjectInfo, 'version'>,
    private readonly properties: PropertySource
  ) {}

  get vcsInitialized(): boolean {
    return this.isVcsInitialized
  }

  /**
   * Returns `false` when the VCS was already configured and the call was ignored.
   */
  vcs(url: string, options: VcsOptions = {}): boolean {
    if (this.isVcsInitialized) return false

    const prefix = options.prefix ?? DEFAULT_SCM_PREFIX
    const developerConnection = options.developerConnection ?? options.connection
    const info: VcsInfo = { url }
    if (options.connection) info.connection = `${prefix}${options.connection}`
    if (developerConnection) info.developerConnection = `${prefix}${developerConnection}`

    this.vcsInfo = info
    this.isVcsInitialized = true
    return true
  }

  github(project: string, options: GithubOptions): void {
    const webUrl = `https://github.com/${options.org}/${project}`
    if (!this.isVcsInitialized) {
      this.vcs(webUrl, { connection: `${webUrl}.git` })
    }

    const addToRelease =
      options.addToRelease ?? parseBooleanToken(this.properties.get(`${PUBLISHING_NAMESPACE}.github`)) === true
    if (addToRelease) {
      this.repository('github', `https://maven.pkg.github.com/${options.org}/${project}`)
    }
  }

  repository(name: string, url: string, options: RepositoryOptions = {}): void {
    this.requireVcs(`adding repository "${name}"`)
    this.repositories.set(name, { name, url, addToRelease: options.addToRelease ?? true })
  }

  /**
   * Sonatype only accepts releases; returns `false` when skipped for a
   * development version.
   */
  sonatype(root: string = DEFAULT_SONATYPE_ROOT): boolean {
    this.requireVcs('adding the Sonatype repository')
    if (isInDevelopment(this.project.version)) return false
    this.repository('sonatype', `${root.replace(/\/+$/, '')}/service/local/staging/deploy/maven2`)
    return true
  }

  getVcs(): VcsInfo | null {
    return this.vcsInfo
  }

  listRepositories(): PublishingRepository[] {
    return Array.from(this.repositories.values())
  }

  hasRepositories(): boolean {
    return this.repositories.size > 0
  }

  credentialsFor(repositoryName: string): RepositoryCredentials | null {
    const keys = credentialKeys(repositoryName)
    const user = this.properties.get(keys.user)
    const token = this.properties.get(keys.token)
    if (!user || !token) return null
    return { user, token }
  }

  releaseKind(): ReleaseKind {
    return isInDevelopment(this.project.version) ? 'development' : 'production'
  }

  plan(): PublicationPlan {
    const releaseKind = this.releaseKind()
    return {
      version: this.project.version,
      releaseKind,
      vcs: this.vcsInfo,
      repositories: this.listRepositories().map((repository) => ({
        ...repository,
        credentials: this.credentialsFor(repository.name),
        releaseTask: repository.addToRelease ? releaseTaskName(releaseKind, repository.name) : null,
      })),
    }
  }

  private requireVcs(step: string): void {
    if (!this.isVcsInitialized) {
      throw missingPrerequisite(
        'project VCS is not configured',
        `Call vcs() or github() before ${step}.`
      )
    }
  }
}
