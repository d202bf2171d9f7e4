/**
 * JSON driver definitions. Lets a new meter model be described as data and
 * loaded into the registry without code. Schemas are the source of truth;
 * types are derived with z.infer<>.
 */
import { z } from 'zod'
import type { FieldDescriptor, FieldMatcher, MeterDriver } from './types'
import { MEASUREMENT_TYPES, METER_TYPES, PrintProperty } from './types'
import { QUANTITIES } from './units'
import { VIF_RANGES } from './vif'
import { dateField, defineDriver, lookupField, numericField, textField } from './fields'
import { sortRules } from './translate'
import { DriverDefinitionError } from './errors'

const nr = z.union([z.number().int().nonnegative(), z.literal('any')])

export const FieldMatcherSchema = z.object({
  difVifKey: z.string().regex(/^([0-9A-Fa-f]{2})+$/, 'hex dif/vif key').optional(),
  measurementType: z.union([z.enum(MEASUREMENT_TYPES), z.literal('any')]).optional(),
  vifRange: z.union([z.enum(VIF_RANGES), z.literal('any')]).optional(),
  storageNr: nr.optional(),
  tariffNr: nr.optional(),
  indexNr: z.union([z.number().int().positive(), z.literal('any')]).optional(),
})

export const TranslationTableSchema = z.object({
  name: z.string().min(1),
  okValue: z.number().int().nonnegative().default(0),
  okLabel: z.string().default('OK'),
  unknownLabel: z.string().min(1),
  hexDigits: z.number().int().positive().optional(),
  rules: z.array(z.object({
    value: z.number().int().positive(),
    label: z.string().min(1),
  })),
})

const PRINT_FLAGS = {
  field: PrintProperty.FIELD,
  json: PrintProperty.JSON,
  important: PrintProperty.IMPORTANT,
} as const

export const FieldDefinitionSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'snake_case field name'),
  quantity: z.enum(QUANTITIES),
  kind: z.enum(['numeric', 'string', 'date', 'lookup']),
  match: FieldMatcherSchema,
  print: z.array(z.enum(['field', 'json', 'important'])).default(['json']),
  description: z.string().default(''),
  lookup: TranslationTableSchema.optional(),
  series: z.object({ name: z.string().min(1), period: z.number().int().positive() }).optional(),
})

export const DriverDefinitionSchema = z.object({
  name: z.string().regex(/^[a-z0-9_]+$/, 'lower case driver name'),
  meterType: z.enum(METER_TYPES),
  detections: z.array(z.object({
    manufacturer: z.string().regex(/^[A-Z]{3}$/, 'three letter manufacturer flag'),
    version: z.number().int().min(0).max(0xff),
    type: z.number().int().min(0).max(0xff),
  })),
  fields: z.array(FieldDefinitionSchema).min(1),
})

export type FieldDefinition = z.infer<typeof FieldDefinitionSchema>
export type DriverDefinition = z.infer<typeof DriverDefinitionSchema>

function toDescriptor(driver: string, def: FieldDefinition): FieldDescriptor {
  const match: FieldMatcher = def.match.difVifKey
    ? { ...def.match, difVifKey: def.match.difVifKey.toUpperCase() }
    : def.match
  const options = {
    print: def.print.reduce((bits, p) => bits | PRINT_FLAGS[p], 0),
    description: def.description,
    series: def.series,
  }
  switch (def.kind) {
    case 'numeric':
      if (def.quantity === 'Text') throw new DriverDefinitionError(driver, `${def.name} is numeric but has quantity Text`)
      return numericField(def.name, def.quantity, match, options)
    case 'string':
      return textField(def.name, match, options)
    case 'date':
      return dateField(def.name, match, options)
    case 'lookup':
      if (!def.lookup) throw new DriverDefinitionError(driver, `${def.name} has no translation table`)
      return lookupField(def.name, match, { ...def.lookup, rules: sortRules(def.lookup.rules) }, options)
  }
}

/** Validates raw JSON data and builds a driver from it. */
export function driverFromDefinition(input: unknown): MeterDriver {
  const result = DriverDefinitionSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new DriverDefinitionError(
      typeof input === 'object' && input !== null && 'name' in input ? String(input.name) : '?',
      `${issue.path.join('.')}: ${issue.message}`,
    )
  }
  const def = result.data
  return defineDriver({
    name: def.name,
    meterType: def.meterType,
    detections: def.detections,
    fields: def.fields.map((f) => toDescriptor(def.name, f)),
  })
}
