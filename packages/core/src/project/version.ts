import fs from 'node:fs'
import path from 'node:path'

export const VERSION_FILE_SEGMENTS = ['build', 'project-version.txt'] as const

/**
 * Snapshot and `dev` versions are development builds; anything else is a
 * production release.
 */
export function isInDevelopment(version: string): boolean {
  const normalized = version.trim()
  return normalized.toUpperCase().endsWith('SNAPSHOT') || normalized.includes('dev')
}

export function versionFilePath(rootDir: string): string {
  return path.join(rootDir, ...VERSION_FILE_SEGMENTS)
}

export function writeVersionFile(rootDir: string, version: string): string {
  const file = versionFilePath(rootDir)
  fs.mkdirSync(path.dirname(file), { recursive: true })
  fs.writeFileSync(file, version)
  return file
}
