import { describe, it, expect } from 'vitest'
import type { TelegramRecord } from '../types'
import { indexTelegram } from '../byteKeyIndex'
import { extractDate, extractNumeric, extractString, extractUInt, findRecord } from '../extractor'
import { parseHex } from '../hex'
import { findField, difVifKey } from '../fields'

function record(hex: string): TelegramRecord {
  const telegram = indexTelegram(parseHex(hex))
  expect(telegram.issues).toEqual([])
  return telegram.records[0]
}

describe('extractNumeric', () => {
  it('applies the VIF exponent to integers', () => {
    expect(extractNumeric(record('0403E8030000'))).toBe(1000)
    expect(extractNumeric(record('041539300000'))).toBe(1234.5)
    expect(extractNumeric(record('0413C2080000'))).toBe(2.242)
    expect(extractNumeric(record('04FB000A000000'))).toBe(1)
  })

  it('reads integers as unsigned', () => {
    expect(extractNumeric(record('040600000080'))).toBe(2147483648000)
    expect(extractNumeric(record('0613010000000001'))).toBe(1099511627.777)
  })

  it('decodes BCD including the negative marker', () => {
    expect(extractNumeric(record('0A133412'))).toBe(1.234)
    expect(extractNumeric(record('0A5B12F0'))).toBe(-12)
  })

  it('decodes 32 bit floats', () => {
    expect(extractNumeric(record('052B0000C03F'))).toBe(1.5)
  })

  it('leaves the value in the VIF unit', () => {
    const r = record('02440A00')
    expect(r.vif.unit).toBe('m3min')
    expect(extractNumeric(r)).toBe(0.01)
  })

  it('returns null for variable length data', () => {
    expect(extractNumeric(record('0D7803434241'))).toBeNull()
  })
})

function binaryHex(value: number, width: number): string {
  let hex = ''
  let rest = value
  for (let i = 0; i < width; i++) {
    hex += (rest % 256).toString(16).padStart(2, '0')
    rest = Math.floor(rest / 256)
  }
  return hex
}

function bcdHex(value: number, width: number): string {
  const digits = String(value).padStart(width * 2, '0')
  let hex = ''
  for (let i = width - 1; i >= 0; i--) {
    hex += digits.slice(i * 2, i * 2 + 2)
  }
  return hex
}

describe('extractNumeric per data coding', () => {
  const cases: Array<[dif: number, width: number, encode: (v: number, w: number) => string, value: number]> = [
    [0x01, 1, binaryHex, 200],
    [0x02, 2, binaryHex, 51234],
    [0x03, 3, binaryHex, 11259375],
    [0x04, 4, binaryHex, 4000000000],
    [0x06, 6, binaryHex, 1099511627781],
    [0x07, 8, binaryHex, 4503599627370499],
    [0x09, 1, bcdHex, 42],
    [0x0a, 2, bcdHex, 1234],
    [0x0b, 3, bcdHex, 123456],
    [0x0c, 4, bcdHex, 12345678],
    [0x0e, 6, bcdHex, 123456789012],
  ]

  for (const [dif, width, encode, value] of cases) {
    it(`scales DIF 0x${dif.toString(16)} across the volume exponents`, () => {
      // volume VIFs 0x10-0x17 carry exponents -6..1
      for (let vif = 0x10; vif <= 0x17; vif++) {
        const exponent = vif - 0x16
        const r = record(binaryHex(dif, 1) + binaryHex(vif, 1) + encode(value, width))
        expect(r.vif.exponent).toBe(exponent)
        expect(extractNumeric(r)).toBe(Number(`${value}e${exponent}`))
      }
    })
  }

  it('rounds 64 bit values above 2^53 to the nearest double', () => {
    expect(extractNumeric(record('0716FFFFFFFFFFFFFFFF'))).toBe(2 ** 64)
  })

  it('reads LVAR binary and signed BCD', () => {
    expect(extractNumeric(record('0D13E3AABBCC'))).toBe(13417.386)
    expect(extractNumeric(record('0D13C23412'))).toBe(1.234)
    expect(extractNumeric(record('0D13D23412'))).toBe(-1.234)
    expect(extractUInt(record('0DFD17D105'))).toBe(-5)
  })
})

describe('extractUInt', () => {
  it('ignores the VIF exponent', () => {
    expect(extractUInt(record('03FD170C0C0C'))).toBe(0x0c0c0c)
    expect(extractUInt(record('02FD172400'))).toBe(36)
  })
})

describe('extractDate', () => {
  it('decodes type G dates', () => {
    expect(extractDate(record('026CC121'))).toBe('2022-01-01')
    expect(extractDate(record('026C2124'))).toBe('2017-04-01')
  })

  it('renders an unset date literally', () => {
    expect(extractDate(record('026CFFFF'))).toBe('2127-15-31')
  })

  it('decodes type F and type I date times', () => {
    expect(extractDate(record('046D1E0CC121'))).toBe('2022-01-01 12:30')
    expect(extractDate(record('066D2D1E0CC121'))).toBe('2022-01-01 12:30:45')
  })
})

describe('extractString', () => {
  it('reverses ASCII and BCD data', () => {
    expect(extractString(record('0D7803434241'))).toBe('ABC')
    expect(extractString(record('0C7878563412'))).toBe('12345678')
  })
})

describe('findRecord', () => {
  const telegram = indexTelegram(parseHex('0413E80300000413D00700004413B80B0000'))

  it('defaults to instantaneous, storage 0, tariff 0, first match', () => {
    expect(findRecord(telegram, findField('Instantaneous', 'Volume'))!.offset).toBe(0)
    expect(findRecord(telegram, findField('Instantaneous', 'Volume', { indexNr: 2 }))!.offset).toBe(6)
    expect(findRecord(telegram, findField('Instantaneous', 'Volume', { indexNr: 3 }))).toBeNull()
    expect(findRecord(telegram, findField('Instantaneous', 'Volume', { storageNr: 1 }))!.offset).toBe(12)
    expect(findRecord(telegram, findField('Maximum', 'Volume'))).toBeNull()
  })

  it('matches any storage with a wildcard', () => {
    expect(findRecord(telegram, findField('Instantaneous', 'Volume', { storageNr: 'any', indexNr: 3 }))!.offset)
      .toBe(12)
  })

  it('skips excluded records only for wildcard indexes', () => {
    const first = telegram.records[0]
    const exclude = new Set([first])
    expect(findRecord(telegram, findField('Instantaneous', 'Volume', { indexNr: 'any' }), exclude)!.offset).toBe(6)
    expect(findRecord(telegram, findField('Instantaneous', 'Volume'), exclude)!.offset).toBe(0)
    expect(findRecord(telegram, difVifKey('0413', 'any'), exclude)!.offset).toBe(6)
  })

  it('resolves literal keys by occurrence', () => {
    expect(findRecord(telegram, difVifKey('0413', 2))!.offset).toBe(6)
    expect(findRecord(telegram, difVifKey('4413'))!.offset).toBe(12)
  })
})
