import type {
  DriverDetection, FieldDescriptor, FieldMatcher, FieldSeries, MeasurementType, MeterDriver, MeterType,
} from './types'
import type { Quantity, Unit } from './units'
import type { TranslationTable } from './translate'
import type { VIFRange } from './vif'
import { assertQuantity, CANONICAL_UNITS } from './units'
import { isErrorFlagsKey } from './vif'
import { DriverDefinitionError, UnitMismatchError } from './errors'

// --- Selectors ---

export function findField(
  measurementType: MeasurementType,
  vifRange: VIFRange,
  nrs: Pick<FieldMatcher, 'storageNr' | 'tariffNr' | 'indexNr'> = {},
): FieldMatcher {
  return { measurementType, vifRange, ...nrs }
}

export function difVifKey(key: string, indexNr: FieldMatcher['indexNr'] = 1): FieldMatcher {
  return { difVifKey: key.toUpperCase(), indexNr }
}

// --- Descriptors ---

interface FieldOptions {
  print: number
  description: string
  series?: FieldSeries
}

export function numericField(
  name: string,
  quantity: Exclude<Quantity, 'Text'>,
  match: FieldMatcher,
  options: FieldOptions,
): FieldDescriptor {
  return { name, quantity, unit: CANONICAL_UNITS[quantity], kind: 'numeric', match, ...options }
}

export function textField(name: string, match: FieldMatcher, options: FieldOptions): FieldDescriptor {
  return { name, quantity: 'Text', unit: 'txt', kind: 'string', match, ...options }
}

export function dateField(name: string, match: FieldMatcher, options: FieldOptions): FieldDescriptor {
  return { name, quantity: 'Text', unit: 'txt', kind: 'date', match, ...options }
}

export function lookupField(
  name: string,
  match: FieldMatcher,
  lookup: TranslationTable,
  options: FieldOptions,
): FieldDescriptor {
  return { name, quantity: 'Text', unit: 'txt', kind: 'lookup', match, lookup, ...options }
}

/**
 * Expands one field per historic storage slot: period 1 reads storage
 * `firstStorageNr`, period 2 the next one, and so on. Names follow
 * `${prefix}_${period}_${suffix}`.
 */
export function monthlySeries(
  count: number,
  firstStorageNr: number,
  build: (period: number, storageNr: number) => FieldDescriptor,
): FieldDescriptor[] {
  return Array.from({ length: count }, (_, i) => build(i + 1, firstStorageNr + i))
}

// --- Drivers ---

export function slotKey(name: string, quantity: Quantity): string {
  return `${name}:${quantity}`
}

function matchesErrorFlags(match: FieldMatcher): boolean {
  if (match.difVifKey) return isErrorFlagsKey(match.difVifKey)
  return match.vifRange === 'ErrorFlags'
}

function validateField(driver: string, field: FieldDescriptor): void {
  try {
    assertQuantity(field.unit, field.quantity)
  } catch (e) {
    if (e instanceof UnitMismatchError) throw new DriverDefinitionError(driver, `${field.name}: ${e.message}`)
    throw e
  }
  if (field.unit !== CANONICAL_UNITS[field.quantity]) {
    throw new DriverDefinitionError(driver, `${field.name} must store ${CANONICAL_UNITS[field.quantity]}`)
  }
  if (!field.match.difVifKey && !field.match.vifRange) {
    throw new DriverDefinitionError(driver, `${field.name} has neither a dif/vif key nor a vif range`)
  }
  if (field.kind === 'lookup') {
    if (!field.lookup) throw new DriverDefinitionError(driver, `${field.name} has no translation table`)
    if (field.quantity !== 'Text') throw new DriverDefinitionError(driver, `${field.name} lookup must be Text`)
  } else if (matchesErrorFlags(field.match)) {
    throw new DriverDefinitionError(driver, `${field.name} reads error flags and must be a lookup field`)
  }
  if (field.kind === 'numeric' && field.quantity === 'Text') {
    throw new DriverDefinitionError(driver, `${field.name} is numeric but has quantity Text`)
  }
}

export function defineDriver(definition: {
  name: string
  meterType: MeterType
  detections: DriverDetection[]
  fields: FieldDescriptor[]
}): MeterDriver {
  const seen = new Set<string>()
  for (const field of definition.fields) {
    validateField(definition.name, field)
    const key = slotKey(field.name, field.quantity)
    if (seen.has(key)) throw new DriverDefinitionError(definition.name, `duplicate field ${field.name} (${field.quantity})`)
    seen.add(key)
  }
  return Object.freeze({
    name: definition.name,
    meterType: definition.meterType,
    detections: Object.freeze([...definition.detections]),
    fields: Object.freeze(definition.fields.map((f) => Object.freeze({ ...f, match: Object.freeze({ ...f.match }) }))),
  })
}
