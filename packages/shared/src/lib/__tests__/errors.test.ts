import { ConfigurationError, isConfigurationError, missingPrerequisite } from '../errors'

describe('configuration errors', () => {
  it('names the missing prerequisite step', () => {
    const error = missingPrerequisite('project VCS', "call vcs() first")
    expect(error).toBeInstanceOf(ConfigurationError)
    expect(error.message).toBe('Missing prerequisite: project VCS')
    expect(error.hint).toBe('call vcs() first')
    expect(isConfigurationError(error)).toBe(true)
  })

  it('does not treat plain errors as configuration errors', () => {
    expect(isConfigurationError(new Error('boom'))).toBe(false)
  })
})
