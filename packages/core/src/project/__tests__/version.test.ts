import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { isInDevelopment, versionFilePath, writeVersionFile } from '../version'

describe('isInDevelopment', () => {
  it('detects snapshot and dev versions', () => {
    expect(isInDevelopment('1.0.0-SNAPSHOT')).toBe(true)
    expect(isInDevelopment('1.0.0-snapshot')).toBe(true)
    expect(isInDevelopment('0.4.0-dev-3')).toBe(true)
  })

  it('treats plain versions as releases', () => {
    expect(isInDevelopment('1.2.0')).toBe(false)
    expect(isInDevelopment('2.0.0-rc1')).toBe(false)
  })
})

describe('writeVersionFile', () => {
  let tmpDir: string

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'version-test-'))
  })

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true })
  })

  it('writes the version under build/', () => {
    const file = writeVersionFile(tmpDir, '0.4.0-dev-3')

    expect(file).toBe(path.join(tmpDir, 'build', 'project-version.txt'))
    expect(file).toBe(versionFilePath(tmpDir))
    expect(fs.readFileSync(file, 'utf8')).toBe('0.4.0-dev-3')
  })

  it('overwrites an existing version file', () => {
    writeVersionFile(tmpDir, '1.0.0')
    const file = writeVersionFile(tmpDir, '1.0.1')
    expect(fs.readFileSync(file, 'utf8')).toBe('1.0.1')
  })
})
