import { parseBooleanFlag, parseBooleanToken, parseBooleanWithDefault } from '../boolean'

describe('parseBooleanToken', () => {
  it('recognizes true and false tokens regardless of case', () => {
    expect(parseBooleanToken('YES')).toBe(true)
    expect(parseBooleanToken(' on ')).toBe(true)
    expect(parseBooleanToken('Disabled')).toBe(false)
    expect(parseBooleanToken('0')).toBe(false)
  })

  it('returns null for blank or unknown values', () => {
    expect(parseBooleanToken(undefined)).toBeNull()
    expect(parseBooleanToken('   ')).toBeNull()
    expect(parseBooleanToken('maybe')).toBeNull()
  })
})

describe('parseBooleanWithDefault', () => {
  it('falls back when the token is not recognized', () => {
    expect(parseBooleanWithDefault('maybe', true)).toBe(true)
    expect(parseBooleanWithDefault('no', true)).toBe(false)
  })
})

describe('parseBooleanFlag', () => {
  it('accepts parsed CLI flag shapes', () => {
    expect(parseBooleanFlag(true)).toBe(true)
    expect(parseBooleanFlag('false', true)).toBe(false)
    expect(parseBooleanFlag(['yes', 'no'])).toBe(false)
    expect(parseBooleanFlag(undefined, true)).toBe(true)
  })
})
