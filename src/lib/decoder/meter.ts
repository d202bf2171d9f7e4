import type { FieldDescriptor, MeterDriver, MeterEnvelope, MeterType, SeriesPoint, TelegramRecord } from './types'
import type { Quantity, Unit } from './units'
import { PrintProperty } from './types'
import { Telegram, indexTelegram } from './byteKeyIndex'
import { extractDate, extractNumeric, extractString, extractUInt, findRecord, isConcreteIndex } from './extractor'
import { convert, quantityOf, unitLabel } from './units'
import { translate } from './translate'
import { slotKey } from './fields'
import { UnitMismatchError } from './errors'

const MEDIA: Record<number, string> = {
  0x00: 'other',
  0x02: 'electricity',
  0x03: 'gas',
  0x04: 'heat',
  0x06: 'warm water',
  0x07: 'water',
  0x08: 'heat cost allocation',
  0x0a: 'cooling load volume at outlet',
  0x0b: 'cooling load volume at inlet',
  0x0c: 'heat volume at inlet',
  0x0d: 'heat/cooling load',
  0x15: 'hot water',
  0x16: 'cold water',
  0x1a: 'smoke detector',
}

const DEFAULT_MEDIA: Record<MeterType, string> = {
  HeatMeter: 'heat',
  WaterMeter: 'water',
  HeatCoolingMeter: 'heat/cooling load',
  ElectricityMeter: 'electricity',
  GasMeter: 'gas',
}

export function mediaName(type: number): string {
  return MEDIA[type] ?? `unknown(0x${type.toString(16).padStart(2, '0')})`
}

export interface MeterOptions {
  name: string
  id: string
  /** Extra JSON keys: every numeric field is also printed in these units when the quantity fits. */
  conversions?: Unit[]
}

export interface DecodeResult {
  telegram: Telegram
  /** JSON keys of the slots written by this pass, in driver order. */
  updated: string[]
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

function fieldsTimestamp(t: Date): string {
  return `${t.getUTCFullYear()}-${pad2(t.getUTCMonth() + 1)}-${pad2(t.getUTCDate())} `
    + `${pad2(t.getUTCHours())}:${pad2(t.getUTCMinutes())}.${pad2(t.getUTCSeconds())}`
}

function jsonTimestamp(t: Date): string {
  return t.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

export function jsonKey(field: FieldDescriptor, unit: Unit = field.unit): string {
  return field.quantity === 'Text' ? field.name : `${field.name}_${unit}`
}

/**
 * Decoded state of one physical device. Each decode pass writes the slots its
 * telegram carries; slots of fields the telegram lacks keep their value.
 * Not safe for overlapping decodes on the same instance.
 */
export class Meter {
  readonly driver: MeterDriver
  readonly name: string
  readonly id: string
  private readonly conversions: Unit[]
  private slots = new Map<string, number | string>()
  private media: string | undefined

  constructor(driver: MeterDriver, options: MeterOptions) {
    this.driver = driver
    this.name = options.name
    this.id = options.id
    this.conversions = options.conversions ?? []
  }

  decode(payload: Uint8Array, envelope?: Pick<MeterEnvelope, 'type'>): DecodeResult {
    const telegram = indexTelegram(payload)
    if (envelope) this.media = mediaName(envelope.type)

    const fields = this.driver.fields
    const ordered = [
      ...fields.filter((f) => isConcreteIndex(f.match)),
      ...fields.filter((f) => !isConcreteIndex(f.match)),
    ]
    const claimed = new Set<TelegramRecord>()
    const written = new Set<FieldDescriptor>()

    for (const field of ordered) {
      const record = findRecord(telegram, field.match, claimed)
      if (!record) continue

      const value = this.decodeField(field, record)
      if (value === null) {
        telegram.explain(record.offset, ` ${jsonKey(field)} (not decodable as ${field.kind})`)
        continue
      }
      this.slots.set(slotKey(field.name, field.quantity), value)
      // only a stored value takes the record away from wildcard fields
      if (isConcreteIndex(field.match)) claimed.add(record)
      written.add(field)
      telegram.explain(record.offset, ` ${jsonKey(field)} (${value})`)
    }

    return { telegram, updated: fields.filter((f) => written.has(f)).map((f) => jsonKey(f)) }
  }

  private decodeField(field: FieldDescriptor, record: TelegramRecord): number | string | null {
    switch (field.kind) {
      case 'numeric': {
        const raw = extractNumeric(record)
        if (raw === null) return null
        const from = record.vif.unit
        // VIFs without a unit (vendor specific, durations) are stored as scaled
        if (!from) return raw
        if (quantityOf(from) !== field.quantity) return null
        return convert(raw, from, field.unit)
      }
      case 'string':
        return extractString(record)
      case 'date':
        return extractDate(record)
      case 'lookup': {
        const code = extractUInt(record)
        if (code === null || !field.lookup) return null
        return translate(field.lookup, code)
      }
    }
  }

  private descriptor(name: string, quantity: Quantity, requested: Unit): FieldDescriptor {
    const candidates = this.driver.fields.filter((f) => f.name === name)
    if (candidates.length === 0) throw new Error(`${this.driver.name} has no field ${name}`)
    const field = candidates.find((f) => f.quantity === quantity)
    if (!field) throw new UnitMismatchError(requested, candidates.map((f) => f.quantity).join('/'))
    return field
  }

  has(name: string, quantity: Quantity): boolean {
    return this.slots.has(slotKey(name, quantity))
  }

  getNumeric(name: string, unit: Unit): number | undefined {
    const field = this.descriptor(name, quantityOf(unit), unit)
    const value = this.slots.get(slotKey(field.name, field.quantity))
    return typeof value === 'number' ? convert(value, field.unit, unit) : undefined
  }

  setNumeric(name: string, value: number, unit: Unit): void {
    const field = this.descriptor(name, quantityOf(unit), unit)
    this.slots.set(slotKey(field.name, field.quantity), convert(value, unit, field.unit))
  }

  getText(name: string): string | undefined {
    const value = this.slots.get(slotKey(this.descriptor(name, 'Text', 'txt').name, 'Text'))
    return typeof value === 'string' ? value : undefined
  }

  setText(name: string, value: string): void {
    this.slots.set(slotKey(this.descriptor(name, 'Text', 'txt').name, 'Text'), value)
  }

  /** Set points of one history series, ordered by period. */
  series(name: string, unit: Unit = 'txt'): SeriesPoint[] {
    const quantity = quantityOf(unit)
    const points: SeriesPoint[] = []
    for (const field of this.driver.fields) {
      const series = field.series
      if (!series || series.name !== name || field.quantity !== quantity) continue
      const value = this.slots.get(slotKey(field.name, field.quantity))
      if (value === undefined) continue
      points.push({
        period: series.period,
        value: typeof value === 'number' ? convert(value, field.unit, unit) : value,
      })
    }
    return points.sort((a, b) => a.period - b.period)
  }

  private printed(flag: number): FieldDescriptor[] {
    return this.driver.fields.filter((f) => (f.print & flag) !== 0)
  }

  toJson(timestamp: Date): Record<string, string | number> {
    const out: Record<string, string | number> = {
      media: this.media ?? DEFAULT_MEDIA[this.driver.meterType],
      meter: this.driver.name,
      name: this.name,
      id: this.id,
    }
    for (const field of this.printed(PrintProperty.JSON)) {
      const value = this.slots.get(slotKey(field.name, field.quantity))
      if (value === undefined) continue
      out[jsonKey(field)] = value
      if (typeof value !== 'number') continue
      for (const unit of this.conversions) {
        if (unit === field.unit || quantityOf(unit) !== field.quantity) continue
        out[jsonKey(field, unit)] = convert(value, field.unit, unit)
      }
    }
    out.timestamp = jsonTimestamp(timestamp)
    return out
  }

  toFields(timestamp: Date, separator = ';'): string {
    const columns = [this.name, this.id]
    for (const field of this.printed(PrintProperty.FIELD)) {
      const value = this.slots.get(slotKey(field.name, field.quantity))
      columns.push(typeof value === 'number' ? value.toFixed(6) : value ?? '')
    }
    columns.push(fieldsTimestamp(timestamp))
    return columns.join(separator)
  }

  toHumanReadable(timestamp: Date): string {
    const columns = [this.name, this.id]
    for (const field of this.printed(PrintProperty.IMPORTANT)) {
      const value = this.slots.get(slotKey(field.name, field.quantity))
      if (value === undefined) continue
      columns.push(typeof value === 'number' ? `${value} ${unitLabel(field.unit)}` : value)
    }
    columns.push(fieldsTimestamp(timestamp))
    return columns.join('\t')
  }
}
