import type { Unit } from './units'

export const VIF_RANGES = [
  'EnergyWh',
  'EnergyMJ',
  'Volume',
  'Mass',
  'OnTime',
  'OperatingTime',
  'PowerW',
  'PowerJh',
  'VolumeFlow',
  'VolumeFlowExt',
  'VolumeFlowExtS',
  'MassFlow',
  'FlowTemperature',
  'ReturnTemperature',
  'TemperatureDifference',
  'ExternalTemperature',
  'Pressure',
  'Date',
  'DateTime',
  'HeatCostAllocation',
  'AveragingDuration',
  'ActualityDuration',
  'FabricationNo',
  'EnhancedIdentification',
  'BusAddress',
  'ManufacturerSpecific',
  'EnergyMWh',
  'EnergyGJ',
  'VolumeHectoM3',
  'PowerMW',
  'AccessNumber',
  'Medium',
  'Manufacturer',
  'ParameterSet',
  'ModelVersion',
  'HardwareVersion',
  'FirmwareVersion',
  'SoftwareVersion',
  'ErrorFlags',
  'DigitalOutput',
  'DigitalInput',
  'Dimensionless',
  'RemainingBattery',
] as const

export type VIFRange = typeof VIF_RANGES[number]

export interface VifInfo {
  range: VIFRange
  /** Decimal exponent applied to the raw value, in `unit`. */
  exponent: number
  unit?: Unit
  description: string
}

// [first, last, range, exponent of code `first`, unit, description]
type VifSpan = [first: number, last: number, range: VIFRange, exponentBase: number, unit: Unit | undefined, description: string]

const PRIMARY: VifSpan[] = [
  [0x00, 0x07, 'EnergyWh', -3, 'wh', 'Energy'],
  [0x08, 0x0f, 'EnergyMJ', -6, 'mj', 'Energy'],
  [0x10, 0x17, 'Volume', -6, 'm3', 'Volume'],
  [0x18, 0x1f, 'Mass', -3, undefined, 'Mass kg'],
  [0x20, 0x23, 'OnTime', 0, undefined, 'On time'],
  [0x24, 0x27, 'OperatingTime', 0, undefined, 'Operating time'],
  [0x28, 0x2f, 'PowerW', -3, 'w', 'Power'],
  [0x30, 0x37, 'PowerJh', 0, undefined, 'Power J/h'],
  [0x38, 0x3f, 'VolumeFlow', -6, 'm3h', 'Volume flow'],
  [0x40, 0x47, 'VolumeFlowExt', -7, 'm3min', 'Volume flow'],
  [0x48, 0x4f, 'VolumeFlowExtS', -9, 'm3s', 'Volume flow'],
  [0x50, 0x57, 'MassFlow', -3, undefined, 'Mass flow kg/h'],
  [0x58, 0x5b, 'FlowTemperature', -3, 'c', 'Flow temperature'],
  [0x5c, 0x5f, 'ReturnTemperature', -3, 'c', 'Return temperature'],
  [0x60, 0x63, 'TemperatureDifference', -3, undefined, 'Temperature difference K'],
  [0x64, 0x67, 'ExternalTemperature', -3, 'c', 'External temperature'],
  [0x68, 0x6b, 'Pressure', -3, undefined, 'Pressure bar'],
  [0x6c, 0x6c, 'Date', 0, undefined, 'Date'],
  [0x6d, 0x6d, 'DateTime', 0, undefined, 'Date and time'],
  [0x6e, 0x6e, 'HeatCostAllocation', 0, undefined, 'Units for H.C.A.'],
  [0x70, 0x73, 'AveragingDuration', 0, undefined, 'Averaging duration'],
  [0x74, 0x77, 'ActualityDuration', 0, undefined, 'Actuality duration'],
  [0x78, 0x78, 'FabricationNo', 0, undefined, 'Fabrication no'],
  [0x79, 0x79, 'EnhancedIdentification', 0, undefined, 'Enhanced identification'],
  [0x7a, 0x7a, 'BusAddress', 0, undefined, 'Bus address'],
  [0x7f, 0x7f, 'ManufacturerSpecific', 0, undefined, 'Manufacturer specific'],
]

const EXTENSION_FB: VifSpan[] = [
  [0x00, 0x01, 'EnergyMWh', -1, 'mwh', 'Energy'],
  [0x08, 0x09, 'EnergyGJ', -1, 'gj', 'Energy'],
  [0x10, 0x11, 'VolumeHectoM3', 2, 'm3', 'Volume'],
  [0x28, 0x29, 'PowerMW', -1, undefined, 'Power MW'],
]

const EXTENSION_FD: VifSpan[] = [
  [0x08, 0x08, 'AccessNumber', 0, undefined, 'Access number'],
  [0x09, 0x09, 'Medium', 0, undefined, 'Medium'],
  [0x0a, 0x0a, 'Manufacturer', 0, undefined, 'Manufacturer'],
  [0x0b, 0x0b, 'ParameterSet', 0, undefined, 'Parameter set identification'],
  [0x0c, 0x0c, 'ModelVersion', 0, undefined, 'Model version'],
  [0x0d, 0x0d, 'HardwareVersion', 0, undefined, 'Hardware version'],
  [0x0e, 0x0e, 'FirmwareVersion', 0, undefined, 'Firmware version'],
  [0x0f, 0x0f, 'SoftwareVersion', 0, undefined, 'Software version'],
  [0x17, 0x17, 'ErrorFlags', 0, undefined, 'Error flags (binary)'],
  [0x1a, 0x1a, 'DigitalOutput', 0, undefined, 'Digital output (binary)'],
  [0x1b, 0x1b, 'DigitalInput', 0, undefined, 'Digital input (binary)'],
  [0x3a, 0x3a, 'Dimensionless', 0, undefined, 'Dimensionless'],
  [0x74, 0x74, 'RemainingBattery', 0, undefined, 'Remaining battery days'],
]

export const VIF_EXTENSION_FB = 0xfb
export const VIF_EXTENSION_FD = 0xfd

function lookup(table: VifSpan[], code: number): VifInfo | null {
  for (const [first, last, range, exponentBase, unit, description] of table) {
    if (code >= first && code <= last) {
      return { range, exponent: exponentBase + (code - first), unit, description }
    }
  }
  return null
}

/**
 * Resolves a primary VIF, or an FB/FD extension code when `vif` is one of the
 * extension markers. Returns null for reserved or unsupported codes.
 */
export function resolveVif(vif: number, extension?: number): VifInfo | null {
  if (vif === VIF_EXTENSION_FB || vif === VIF_EXTENSION_FD) {
    if (extension === undefined) return null
    return lookup(vif === VIF_EXTENSION_FB ? EXTENSION_FB : EXTENSION_FD, extension & 0x7f)
  }
  const info = lookup(PRIMARY, vif & 0x7f)
  // Time ranges encode their unit (s/min/h/d) in the low bits, not a decimal exponent
  if (info && (info.range === 'OnTime' || info.range === 'OperatingTime'
    || info.range === 'AveragingDuration' || info.range === 'ActualityDuration')) {
    return { ...info, exponent: 0 }
  }
  return info
}

export function isErrorFlagsKey(key: string): boolean {
  return /FD17$/i.test(key)
}
