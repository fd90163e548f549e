import { describe, expect, it } from 'vitest'
import { asPositiveInt, asString, parseFlags } from '../parse-flags.js'

describe('parseFlags', () => {
  it('parses standard single-token values', () => {
    const flags = parseFlags(['--portal', 'esbd', '--limit', '25'])
    expect(flags.portal).toBe('esbd')
    expect(flags.limit).toBe('25')
  })

  it('preserves multi-token flag values', () => {
    const flags = parseFlags(['--config', 'My', 'Portals.json', '--help'])

    expect(flags.config).toBe('My Portals.json')
    expect(flags.help).toBe(true)
  })

  it('ignores non-flag positional tokens', () => {
    const flags = parseFlags(['run', '--portal', 'san_antonio'])
    expect(flags).toEqual({ portal: 'san_antonio' })
  })
})

describe('asPositiveInt', () => {
  it('is undefined when the flag is absent', () => {
    expect(asPositiveInt(undefined)).toBeUndefined()
  })

  it('parses digits', () => {
    expect(asPositiveInt('50')).toBe(50)
  })

  it.each([['0'], ['-3'], ['ten'], ['2.5']])('rejects %s', (value) => {
    expect(asPositiveInt(value)).toBeNull()
  })

  it('rejects a bare flag', () => {
    expect(asPositiveInt(true)).toBeNull()
  })
})

describe('asString', () => {
  it('drops boolean flags', () => {
    expect(asString(true)).toBe('')
    expect(asString('esbd')).toBe('esbd')
  })
})
