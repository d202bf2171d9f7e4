import type { Quantity, Unit } from './units'
import type { VifInfo, VIFRange } from './vif'
import type { TranslationTable } from './translate'

// Order follows the DIF function field (bits 4-5)
export const MEASUREMENT_TYPES = ['Instantaneous', 'Maximum', 'Minimum', 'AtError'] as const

export type MeasurementType = typeof MEASUREMENT_TYPES[number]

export type DataCoding = 'none' | 'int' | 'real' | 'bcd' | 'negative-bcd' | 'variable'

/** One DIF/VIF data record as found in a payload. */
export interface TelegramRecord {
  key: string             // hex of DIF, DIFEs, VIF and VIFEs, e.g. '02FD17'
  offset: number          // byte offset of the DIF within the payload
  measurementType: MeasurementType
  vifRange: VIFRange
  storageNr: number
  tariffNr: number
  subUnitNr: number
  indexNr: number         // 1 + earlier records with the same key
  coding: DataCoding
  vif: VifInfo
  combinable: number[]    // VIFE bytes after the primary (or extension) code
  dataOffset: number
  data: Uint8Array
}

export type Wildcard = 'any'

export interface FieldMatcher {
  difVifKey?: string
  measurementType?: MeasurementType | Wildcard
  vifRange?: VIFRange | Wildcard
  storageNr?: number | Wildcard
  tariffNr?: number | Wildcard
  indexNr?: number | Wildcard
}

export type FieldKind = 'numeric' | 'string' | 'date' | 'lookup'

export const PrintProperty = {
  FIELD: 1,
  JSON: 2,
  IMPORTANT: 4,
} as const

export interface FieldSeries {
  name: string
  period: number          // 1 = most recent closed period
}

export interface FieldDescriptor {
  name: string
  quantity: Quantity
  unit: Unit              // canonical unit of the quantity
  kind: FieldKind
  match: FieldMatcher
  print: number           // PrintProperty bits
  description: string
  lookup?: TranslationTable
  series?: FieldSeries
}

export const METER_TYPES = ['HeatMeter', 'WaterMeter', 'HeatCoolingMeter', 'ElectricityMeter', 'GasMeter'] as const

export type MeterType = typeof METER_TYPES[number]

export interface DriverDetection {
  manufacturer: string    // three letter flag id, e.g. 'ZRI'
  version: number
  type: number
}

export interface MeterDriver {
  name: string
  meterType: MeterType
  detections: readonly DriverDetection[]
  fields: readonly FieldDescriptor[]
}

/** Out-of-band data delivered with a decrypted payload. */
export interface MeterEnvelope {
  manufacturer: string
  id: string
  version: number
  type: number
}

export interface SeriesPoint {
  period: number
  value: number | string
}
