export { indexTelegram, describeTelegram, Telegram } from './byteKeyIndex'
export { extractDate, extractNumeric, extractString, extractUInt, findRecord } from './extractor'
export {
  dateField, defineDriver, difVifKey, findField, lookupField, monthlySeries, numericField, textField,
} from './fields'
export { Meter, mediaName } from './meter'
export { DriverRegistry } from './registry'
export { driverFromDefinition, DriverDefinitionSchema } from './schema'
export { parseMeterConfig, matchesId, MeterConfigSchema } from './config'
export { translate, findAmbiguousRules } from './translate'
export { convert, assertQuantity, CANONICAL_UNITS } from './units'
export { parseHex, formatHex, manufacturerFlag, manufacturerCode } from './hex'
export { StructuralDecodeError, UnitMismatchError, DriverDefinitionError } from './errors'
export { PrintProperty } from './types'
export type {
  DriverDetection,
  FieldDescriptor,
  FieldKind,
  FieldMatcher,
  MeasurementType,
  MeterDriver,
  MeterEnvelope,
  MeterType,
  SeriesPoint,
  TelegramRecord,
} from './types'
export type { DecodeResult, MeterOptions } from './meter'
export type { DriverDefinition } from './schema'
export type { MeterConfig } from './config'
export type { TranslationTable, TranslationRule } from './translate'
export type { Quantity, Unit } from './units'
export type { VIFRange } from './vif'
