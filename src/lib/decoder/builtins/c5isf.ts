import type { TranslationTable } from '../translate'
import { PrintProperty } from '../types'
import { dateField, defineDriver, difVifKey, findField, lookupField, monthlySeries, numericField } from '../fields'

const SUMMARY = PrintProperty.JSON | PrintProperty.FIELD | PrintProperty.IMPORTANT
const JSON_ONLY = PrintProperty.JSON

// Packed decimal: simultaneous conditions are summed into one code
export const C5ISF_ERROR_FLAGS: TranslationTable = {
  name: 'ERROR_FLAGS',
  okValue: 0,
  okLabel: 'OK',
  unknownLabel: 'ERROR_FLAGS',
  rules: [
    { value: 2000, label: 'VERIFICATION_EXPIRED' },
    { value: 1000, label: 'BATTERY_EXPIRED' },
    { value: 800, label: 'WIRELESS_ERROR' },
    { value: 100, label: 'HARDWARE_ERROR3' },
    { value: 50, label: 'VALUE_OVERLOAD' },
    { value: 40, label: 'AIR_INSIDE' },
    { value: 30, label: 'REVERSE_FLOW' },
    { value: 20, label: 'DRY' },
    { value: 10, label: 'ERROR_MEASURING' },
    { value: 9, label: 'HARDWARE_ERROR2' },
    { value: 8, label: 'HARDWARE_ERROR1' },
    { value: 7, label: 'LOW_BATTERY' },
    { value: 6, label: 'SUPPLY_SENSOR_INTERRUPTED' },
    { value: 5, label: 'SHORT_CIRCUIT_SUPPLY_SENSOR' },
    { value: 4, label: 'RETURN_SENSOR_INTERRUPTED' },
    { value: 3, label: 'SHORT_CIRCUIT_RETURN_SENSOR' },
    { value: 2, label: 'TEMP_ABOVE_RANGE' },
    { value: 1, label: 'TEMP_BELOW_RANGE' },
  ],
}

const MONTHS = 14
// Storage 32 holds the most recently closed month, 33 the one before, ...
const FIRST_MONTH_STORAGE = 32

/**
 * Zenner C5-ISF heat meter. Three telegram variants share total energy and
 * volume: T1A1 (type 0x0d) adds status and 14 months of energy, T1A2 (type
 * 0x07) 14 months of volume, T1B (type 0x04) status and current readings.
 * Month dates are common to T1A1 and T1A2 and share one set of slots.
 */
export const c5isf = defineDriver({
  name: 'c5isf',
  meterType: 'HeatMeter',
  detections: [
    { manufacturer: 'ZRI', version: 0x88, type: 0x0d },
    { manufacturer: 'ZRI', version: 0x88, type: 0x07 },
    { manufacturer: 'ZRI', version: 0x88, type: 0x04 },
  ],
  fields: [
    numericField('total_energy_consumption', 'Energy', findField('Instantaneous', 'EnergyWh'), {
      print: SUMMARY,
      description: 'The total heat energy consumption recorded by this meter.',
    }),
    numericField('total_volume', 'Volume', findField('Instantaneous', 'Volume'), {
      print: SUMMARY,
      description: 'The total heating media volume recorded by this meter.',
    }),
    lookupField('status', difVifKey('02FD17'), C5ISF_ERROR_FLAGS, {
      print: SUMMARY,
      description: 'Status and error flags.',
    }),

    ...monthlySeries(MONTHS, FIRST_MONTH_STORAGE, (period, storageNr) =>
      dateField(`prev_${period}_month`, findField('Instantaneous', 'Date', { storageNr }), {
        print: JSON_ONLY,
        description: `Previous month ${period} last date.`,
        series: { name: 'prev_month', period },
      })),

    // T1A1
    ...monthlySeries(MONTHS, FIRST_MONTH_STORAGE, (period, storageNr) =>
      numericField(`prev_${period}_month`, 'Energy', findField('Instantaneous', 'EnergyWh', { storageNr }), {
        print: JSON_ONLY,
        description: 'The total heat energy consumption recorded at end of previous month.',
        series: { name: 'prev_month', period },
      })),

    // T1A2
    ...monthlySeries(MONTHS, FIRST_MONTH_STORAGE, (period, storageNr) =>
      numericField(`prev_${period}_month`, 'Volume', findField('Instantaneous', 'Volume', { storageNr }), {
        print: JSON_ONLY,
        description: 'The total heating media volume recorded at end of previous month.',
        series: { name: 'prev_month', period },
      })),

    // T1B
    numericField('due_energy_consumption', 'Energy', findField('Instantaneous', 'EnergyWh', { storageNr: 8 }), {
      print: JSON_ONLY,
      description: 'The total heat energy consumption at the due date.',
    }),
    dateField('due_date', findField('Instantaneous', 'Date', { storageNr: 8 }), {
      print: JSON_ONLY,
      description: 'The due date.',
    }),
    numericField('volume_flow', 'Flow', findField('Instantaneous', 'VolumeFlow'), {
      print: JSON_ONLY,
      description: 'The current heat media volume flow.',
    }),
    numericField('power', 'Power', findField('Instantaneous', 'PowerW'), {
      print: JSON_ONLY,
      description: 'The current power consumption.',
    }),
    numericField('total_energy_consumption_last_month', 'Energy',
      findField('Instantaneous', 'EnergyWh', { storageNr: FIRST_MONTH_STORAGE }), {
        print: JSON_ONLY,
        description: 'The total heat energy consumption recorded at end of last month.',
      }),
    dateField('last_month_date', findField('Instantaneous', 'Date', { storageNr: FIRST_MONTH_STORAGE }), {
      print: JSON_ONLY,
      description: 'The last day of last month.',
    }),
    numericField('max_power_last_month', 'Power',
      findField('Maximum', 'PowerW', { storageNr: FIRST_MONTH_STORAGE, tariffNr: 0, indexNr: 1 }), {
        print: JSON_ONLY,
        description: 'Maximum power consumption last month.',
      }),
    numericField('flow_temperature', 'Temperature', findField('Instantaneous', 'FlowTemperature'), {
      print: JSON_ONLY,
      description: 'The current forward heat media temperature.',
    }),
    numericField('return_temperature', 'Temperature', findField('Instantaneous', 'ReturnTemperature'), {
      print: JSON_ONLY,
      description: 'The current return heat media temperature.',
    }),
  ],
})
