import { createPropertySource } from '../properties'
import { toEnvKey } from '../string'

describe('toEnvKey', () => {
  it('upper-snake-cases dotted property names', () => {
    expect(toEnvKey('publishing.github.token')).toBe('PUBLISHING_GITHUB_TOKEN')
    expect(toEnvKey('publishing.my-repo.user')).toBe('PUBLISHING_MY_REPO_USER')
  })
})

describe('createPropertySource', () => {
  it('prefers configured properties over the environment', () => {
    const source = createPropertySource({
      properties: { 'publishing.github.user': 'from-config' },
      env: { 'publishing.github.user': 'from-env', PUBLISHING_GITHUB_USER: 'from-env-upper' },
    })
    expect(source.get('publishing.github.user')).toBe('from-config')
  })

  it('falls back to the exact env key, then the upper-snake-case key', () => {
    const exact = createPropertySource({ env: { 'publishing.space.token': 'exact' } })
    expect(exact.get('publishing.space.token')).toBe('exact')

    const upper = createPropertySource({ env: { PUBLISHING_SPACE_TOKEN: 'upper' } })
    expect(upper.get('publishing.space.token')).toBe('upper')
  })

  it('ignores blank values', () => {
    const source = createPropertySource({
      properties: { 'publishing.github.user': '  ' },
      env: { PUBLISHING_GITHUB_USER: '' },
    })
    expect(source.get('publishing.github.user')).toBeUndefined()
  })
})
