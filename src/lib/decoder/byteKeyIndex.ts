import type { DataCoding, TelegramRecord } from './types'
import { MEASUREMENT_TYPES } from './types'
import { StructuralDecodeError } from './errors'
import { resolveVif, VIF_EXTENSION_FB, VIF_EXTENSION_FD } from './vif'
import { formatHex } from './hex'

const MAX_DIFE = 10
const MAX_VIFE = 10

const DIF_IDLE_FILLER = 0x2f
const DIF_MANUFACTURER_DATA = 0x0f
const DIF_MORE_RECORDS_FOLLOW = 0x1f

interface Coding {
  coding: DataCoding
  width: number   // -1 = LVAR byte follows
}

const DATA_CODINGS: Coding[] = [
  { coding: 'none', width: 0 },
  { coding: 'int', width: 1 },
  { coding: 'int', width: 2 },
  { coding: 'int', width: 3 },
  { coding: 'int', width: 4 },
  { coding: 'real', width: 4 },
  { coding: 'int', width: 6 },
  { coding: 'int', width: 8 },
  { coding: 'none', width: 0 },  // selection for readout
  { coding: 'bcd', width: 1 },
  { coding: 'bcd', width: 2 },
  { coding: 'bcd', width: 3 },
  { coding: 'bcd', width: 4 },
  { coding: 'variable', width: -1 },
  { coding: 'bcd', width: 6 },
  { coding: 'none', width: 0 },  // special functions, handled before lookup
]

// LVAR byte of a variable length record (DIF low nibble 0xD)
function lvarCoding(lvar: number): Coding | null {
  if (lvar <= 0xbf) return { coding: 'variable', width: lvar }
  if (lvar >= 0xc0 && lvar <= 0xc9) return { coding: 'bcd', width: lvar - 0xc0 }
  if (lvar >= 0xd0 && lvar <= 0xd9) return { coding: 'negative-bcd', width: lvar - 0xd0 }
  if (lvar >= 0xe0 && lvar <= 0xef) return { coding: 'int', width: lvar - 0xe0 }
  if (lvar >= 0xf0 && lvar <= 0xf4) return { coding: 'int', width: 4 * (lvar - 0xec) }
  return null
}

/** Records of one decrypted payload, in wire order. */
export class Telegram {
  readonly records: readonly TelegramRecord[]
  readonly issues: readonly StructuralDecodeError[]
  readonly manufacturerData: Uint8Array
  private byKey = new Map<string, TelegramRecord[]>()
  private explanations = new Map<number, string[]>()

  constructor(records: TelegramRecord[], issues: StructuralDecodeError[], manufacturerData: Uint8Array) {
    this.records = records
    this.issues = issues
    this.manufacturerData = manufacturerData
    for (const r of records) {
      const list = this.byKey.get(r.key) ?? []
      list.push(r)
      this.byKey.set(r.key, list)
    }
  }

  byDifVifKey(key: string, indexNr = 1): TelegramRecord | null {
    return this.byKey.get(key.toUpperCase())?.[indexNr - 1] ?? null
  }

  explain(offset: number, text: string): void {
    const list = this.explanations.get(offset) ?? []
    list.push(text)
    this.explanations.set(offset, list)
  }

  explanationsAt(offset: number): string[] {
    return this.explanations.get(offset) ?? []
  }
}

/**
 * Walks the payload once. A malformed record is dropped and recorded as an
 * issue; records before it are kept and indexing continues where the
 * remaining bytes can still be framed.
 */
export function indexTelegram(payload: Uint8Array): Telegram {
  const records: TelegramRecord[] = []
  const issues: StructuralDecodeError[] = []
  const keyCounts = new Map<string, number>()
  let manufacturerData = new Uint8Array(0)
  let pos = 0

  while (pos < payload.length) {
    const start = pos
    const dif = payload[pos++]

    if (dif === DIF_IDLE_FILLER) continue
    if (dif === DIF_MANUFACTURER_DATA || dif === DIF_MORE_RECORDS_FOLLOW) {
      manufacturerData = payload.slice(pos)
      break
    }

    let storageNr = (dif >> 6) & 0x01
    let tariffNr = 0
    let subUnitNr = 0
    let ext = (dif & 0x80) !== 0
    let difeCount = 0
    while (ext && pos < payload.length && difeCount < MAX_DIFE) {
      const dife = payload[pos++]
      // bitwise ops would wrap at 32 bits once eight DIFEs are chained
      storageNr += (dife & 0x0f) * 2 ** (1 + 4 * difeCount)
      tariffNr += ((dife >> 4) & 0x03) * 2 ** (2 * difeCount)
      subUnitNr += ((dife >> 6) & 0x01) * 2 ** difeCount
      ext = (dife & 0x80) !== 0
      difeCount++
    }
    if (ext) {
      if (difeCount >= MAX_DIFE) {
        issues.push(new StructuralDecodeError('dif-chain', start, 'Too many DIFE bytes'))
        pos = start + 1
        continue
      }
      issues.push(new StructuralDecodeError('truncated', start, 'Payload ends inside DIF chain'))
      break
    }

    if (pos >= payload.length) {
      issues.push(new StructuralDecodeError('truncated', start, 'Payload ends before VIF'))
      break
    }
    const vif = payload[pos++]
    const vifes: number[] = []
    ext = (vif & 0x80) !== 0
    while (ext && pos < payload.length && vifes.length < MAX_VIFE) {
      const vife = payload[pos++]
      vifes.push(vife)
      ext = (vife & 0x80) !== 0
    }
    if (ext) {
      if (vifes.length >= MAX_VIFE) {
        issues.push(new StructuralDecodeError('vif-chain', start, 'Too many VIFE bytes'))
        pos = start + 1
        continue
      }
      issues.push(new StructuralDecodeError('truncated', start, 'Payload ends inside VIF chain'))
      break
    }

    let { coding, width } = DATA_CODINGS[dif & 0x0f]
    let dataOffset = pos
    if (width < 0) {
      if (pos >= payload.length) {
        issues.push(new StructuralDecodeError('truncated', start, 'Payload ends before LVAR'))
        break
      }
      const lvar = payload[pos++]
      dataOffset = pos
      const variable = lvarCoding(lvar)
      if (!variable) {
        issues.push(new StructuralDecodeError('reserved-lvar', start,
          `Reserved LVAR 0x${lvar.toString(16).padStart(2, '0')}`))
        continue
      }
      coding = variable.coding
      width = variable.width
    }
    if (dataOffset + width > payload.length) {
      issues.push(new StructuralDecodeError('truncated', start,
        `Declared ${width} data bytes, ${payload.length - dataOffset} remain`))
      pos = dataOffset
      continue
    }
    pos = dataOffset + width

    const headerEnd = start + 1 + difeCount + 1 + vifes.length
    const isExtension = vif === VIF_EXTENSION_FB || vif === VIF_EXTENSION_FD
    const info = resolveVif(vif, isExtension ? vifes[0] : undefined)
    if (!info) {
      issues.push(new StructuralDecodeError('unknown-vif', start,
        `Unknown VIF ${formatHex(payload.slice(start + 1 + difeCount, headerEnd))}`))
      continue
    }

    const key = formatHex(payload.slice(start, headerEnd))
    const indexNr = (keyCounts.get(key) ?? 0) + 1
    keyCounts.set(key, indexNr)

    records.push({
      key,
      offset: start,
      measurementType: MEASUREMENT_TYPES[(dif >> 4) & 0x03],
      vifRange: info.range,
      storageNr,
      tariffNr,
      subUnitNr,
      indexNr,
      coding,
      vif: info,
      combinable: isExtension ? vifes.slice(1) : vifes,
      dataOffset,
      data: payload.slice(dataOffset, dataOffset + width),
    })
  }

  return new Telegram(records, issues, manufacturerData)
}

/** One line per record: offset, key, data bytes and any explanations. */
export function describeTelegram(telegram: Telegram): string[] {
  const lines = telegram.records.map((r) => {
    const offset = r.offset.toString(16).padStart(2, '0')
    return `${offset}: ${r.key} ${formatHex(r.data)} ${r.vif.description}${telegram.explanationsAt(r.offset).join('')}`
  })
  for (const issue of telegram.issues) {
    lines.push(`!! ${issue.message}`)
  }
  return lines
}
