import type { FieldMatcher, TelegramRecord, Wildcard } from './types'
import type { Telegram } from './byteKeyIndex'
import { formatHex } from './hex'

/**
 * Little-endian unsigned read. Exact up to 2^53; wider values (64-bit
 * counters, long LVAR binaries) are rounded to the nearest double.
 */
function readUnsigned(data: Uint8Array): number {
  if (data.length === 8) {
    return Number(new DataView(data.buffer, data.byteOffset, 8).getBigUint64(0, true))
  }
  let value = 0
  for (let i = data.length - 1; i >= 0; i--) {
    value = value * 256 + data[i]
  }
  return value
}

function readBcd(data: Uint8Array): number {
  let value = 0
  let negative = false
  for (let i = data.length - 1; i >= 0; i--) {
    let hi = data[i] >> 4
    const lo = data[i] & 0x0f
    if (i === data.length - 1 && hi === 0x0f) {
      negative = true
      hi = 0
    }
    value = value * 100 + hi * 10 + lo
  }
  return negative ? -value : value
}

function scale(value: number, exponent: number): number {
  if (exponent >= 0) return value * 10 ** exponent
  // dividing by an exact power of ten keeps e.g. 2242e-3 === 2.242
  return value / 10 ** -exponent
}

/** Raw value with the VIF exponent applied, in the VIF's own unit. */
export function extractNumeric(record: TelegramRecord): number | null {
  switch (record.coding) {
    case 'int':
      return scale(readUnsigned(record.data), record.vif.exponent)
    case 'bcd':
      return scale(readBcd(record.data), record.vif.exponent)
    case 'negative-bcd':
      return scale(-readBcd(record.data), record.vif.exponent)
    case 'real': {
      const view = new DataView(record.data.buffer, record.data.byteOffset, record.data.byteLength)
      return scale(view.getFloat32(0, true), record.vif.exponent)
    }
    default:
      return null
  }
}

/** Unscaled unsigned integer, used for status and info codes. */
export function extractUInt(record: TelegramRecord): number | null {
  switch (record.coding) {
    case 'int':
      return readUnsigned(record.data)
    case 'bcd':
      return readBcd(record.data)
    case 'negative-bcd':
      return -readBcd(record.data)
    default:
      return null
  }
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

/**
 * Renders date types G (2 bytes), F (4 bytes) and I (6 bytes). Components are
 * printed as found, so an unset date reads `2127-15-31`.
 */
export function extractDate(record: TelegramRecord): string | null {
  const d = record.data
  const dateAt = (i: number): string => {
    const day = d[i] & 0x1f
    const month = d[i + 1] & 0x0f
    const year = ((d[i] & 0xe0) >> 5) | ((d[i + 1] & 0xf0) >> 1)
    return `${2000 + year}-${pad2(month)}-${pad2(day)}`
  }
  switch (d.length) {
    case 2:
      return dateAt(0)
    case 4:
      return `${dateAt(2)} ${pad2(d[1] & 0x1f)}:${pad2(d[0] & 0x3f)}`
    case 6:
      return `${dateAt(3)} ${pad2(d[2] & 0x1f)}:${pad2(d[1] & 0x3f)}:${pad2(d[0] & 0x3f)}`
    default:
      return null
  }
}

export function extractString(record: TelegramRecord): string | null {
  switch (record.coding) {
    case 'variable':
      return new TextDecoder().decode(record.data.slice().reverse())
    case 'bcd':
    case 'negative-bcd':
    case 'int':
    case 'real':
      return formatHex(record.data.slice().reverse())
    default:
      return null
  }
}

function matches<T>(pattern: T | Wildcard | undefined, fallback: T | Wildcard, value: T): boolean {
  const p = pattern ?? fallback
  return p === 'any' || p === value
}

export function isConcreteIndex(matcher: FieldMatcher): boolean {
  return matcher.indexNr !== 'any'
}

/**
 * Resolves a selector to at most one record. A literal key matches the key's
 * nth occurrence; a structural pattern matches the nth record fitting all
 * components. Records in `exclude` are skipped by wildcard-index patterns.
 */
export function findRecord(
  telegram: Telegram,
  matcher: FieldMatcher,
  exclude?: ReadonlySet<TelegramRecord>,
): TelegramRecord | null {
  const wildcardIndex = !isConcreteIndex(matcher)
  const skip = (r: TelegramRecord) => wildcardIndex && exclude !== undefined && exclude.has(r)

  if (matcher.difVifKey) {
    const key = matcher.difVifKey.toUpperCase()
    if (!wildcardIndex) {
      return telegram.byDifVifKey(key, typeof matcher.indexNr === 'number' ? matcher.indexNr : 1)
    }
    return telegram.records.find((r) => r.key === key && !skip(r)) ?? null
  }

  let seen = 0
  const wanted = typeof matcher.indexNr === 'number' ? matcher.indexNr : 1
  for (const r of telegram.records) {
    if (!matches(matcher.measurementType, 'Instantaneous', r.measurementType)) continue
    if (!matches(matcher.vifRange, 'any', r.vifRange)) continue
    if (!matches(matcher.storageNr, 0, r.storageNr)) continue
    if (!matches(matcher.tariffNr, 0, r.tariffNr)) continue
    if (wildcardIndex) {
      if (!skip(r)) return r
      continue
    }
    seen++
    if (seen === wanted) return r
  }
  return null
}
