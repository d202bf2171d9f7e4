import type { TranslationTable } from '../translate'
import { PrintProperty } from '../types'
import { defineDriver, difVifKey, findField, lookupField, numericField } from '../fields'

const PRINTED = PrintProperty.FIELD | PrintProperty.JSON

// The manual lists back flow, leaks, zero flow, tampering, no water and low
// battery, but not their bit positions, so any code is shown raw.
export const ULTRIMIS_INFO_CODES: TranslationTable = {
  name: 'INFO_CODES',
  okValue: 0,
  okLabel: 'OK',
  unknownLabel: 'ERR',
  hexDigits: 6,
  rules: [],
}

export const ultrimis = defineDriver({
  name: 'ultrimis',
  meterType: 'WaterMeter',
  detections: [
    { manufacturer: 'APA', version: 0x01, type: 0x16 },
  ],
  fields: [
    numericField('total', 'Volume', findField('Instantaneous', 'Volume'), {
      print: PRINTED,
      description: 'The total water consumption recorded by this meter.',
    }),
    numericField('target', 'Volume', findField('Instantaneous', 'Volume', { storageNr: 1 }), {
      print: PRINTED,
      description: 'The total water consumption recorded at the beginning of this month.',
    }),
    lookupField('current_status', difVifKey('03FD17'), ULTRIMIS_INFO_CODES, {
      print: PRINTED,
      description: 'Status of meter.',
    }),
    numericField('total_backward_flow', 'Volume', difVifKey('04933C'), {
      print: PRINTED,
      description: 'The total water backward flow.',
    }),
  ],
})
