import { describe, it, expect } from 'vitest'
import { matchesId, parseMeterConfig } from '../config'

describe('parseMeterConfig', () => {
  it('parses a meter file', () => {
    const config = parseMeterConfig([
      '# living room',
      'name=Heat',
      'id = 55445555',
      '',
      'driver=c5isf',
      'key=NOKEY',
      'conversions=gj, mwh',
    ].join('\n'))
    expect(config).toEqual({
      name: 'Heat',
      id: '55445555',
      driver: 'c5isf',
      key: 'NOKEY',
      conversions: ['gj', 'mwh'],
    })
  })

  it('carries a hex key through unchanged', () => {
    const key = '00112233445566778899AABBCCDDEEFF'
    expect(parseMeterConfig(`name=Heat\nid=55445555\nkey=${key}`).key).toBe(key)
  })

  it('fills in defaults', () => {
    expect(parseMeterConfig('name=Any\nid=*')).toEqual({ name: 'Any', id: '*', driver: 'auto', conversions: [] })
  })

  it('rejects lines without a key', () => {
    expect(() => parseMeterConfig('name=Heat\nbogus')).toThrow('Line 2: expected key=value, got "bogus"')
  })

  it('rejects bad ids, keys and units', () => {
    expect(() => parseMeterConfig('name=Heat\nid=1234')).toThrow('meter id')
    expect(() => parseMeterConfig('name=Heat\nid=55445555\nkey=test-secret')).toThrow('AES key')
    expect(() => parseMeterConfig('name=Heat\nid=55445555\nconversions=furlong')).toThrow('Unknown unit furlong')
  })
})

describe('matchesId', () => {
  it('matches exact ids and prefixes', () => {
    const exact = parseMeterConfig('name=a\nid=55445555')
    const prefix = parseMeterConfig('name=b\nid=5544*')
    expect(matchesId(exact, '55445555')).toBe(true)
    expect(matchesId(exact, '55445556')).toBe(false)
    expect(matchesId(prefix, '55440000')).toBe(true)
    expect(matchesId(prefix, '12345678')).toBe(false)
  })
})
