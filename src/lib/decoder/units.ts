import { UnitMismatchError } from './errors'

export const QUANTITIES = ['Volume', 'Energy', 'Power', 'Flow', 'Temperature', 'Text'] as const

export type Quantity = typeof QUANTITIES[number]

export type Unit =
  | 'm3' | 'l'
  | 'kwh' | 'mwh' | 'wh' | 'mj' | 'gj'
  | 'kw' | 'w'
  | 'm3h' | 'lh' | 'm3min' | 'm3s'
  | 'c' | 'k' | 'f'
  | 'txt'

interface UnitInfo {
  quantity: Quantity
  label: string
  toCanonical: (v: number) => number
  fromCanonical: (v: number) => number
}

// `per` = how many of this unit make one canonical unit
function linear(quantity: Quantity, label: string, per: number): UnitInfo {
  return {
    quantity,
    label,
    toCanonical: (v) => v / per,
    fromCanonical: (v) => v * per,
  }
}

const UNITS: Record<Unit, UnitInfo> = {
  m3: linear('Volume', 'm3', 1),
  l: linear('Volume', 'l', 1000),

  kwh: linear('Energy', 'kWh', 1),
  mwh: linear('Energy', 'MWh', 0.001),
  wh: linear('Energy', 'Wh', 1000),
  mj: linear('Energy', 'MJ', 3.6),
  gj: linear('Energy', 'GJ', 0.0036),

  kw: linear('Power', 'kW', 1),
  w: linear('Power', 'W', 1000),

  m3h: linear('Flow', 'm3/h', 1),
  lh: linear('Flow', 'l/h', 1000),
  m3min: linear('Flow', 'm3/min', 1 / 60),
  m3s: linear('Flow', 'm3/s', 1 / 3600),

  c: linear('Temperature', '°C', 1),
  k: {
    quantity: 'Temperature',
    label: 'K',
    toCanonical: (v) => v - 273.15,
    fromCanonical: (v) => v + 273.15,
  },
  f: {
    quantity: 'Temperature',
    label: '°F',
    toCanonical: (v) => (v - 32) * 5 / 9,
    fromCanonical: (v) => v * 9 / 5 + 32,
  },

  txt: linear('Text', 'txt', 1),
}

export const CANONICAL_UNITS: Record<Quantity, Unit> = {
  Volume: 'm3',
  Energy: 'kwh',
  Power: 'kw',
  Flow: 'm3h',
  Temperature: 'c',
  Text: 'txt',
}

export function isUnit(value: string): value is Unit {
  return Object.prototype.hasOwnProperty.call(UNITS, value)
}

export function quantityOf(unit: Unit): Quantity {
  return UNITS[unit].quantity
}

export function unitLabel(unit: Unit): string {
  return UNITS[unit].label
}

export function unitsOf(quantity: Quantity): Unit[] {
  return Object.keys(UNITS).filter(isUnit).filter((u) => UNITS[u].quantity === quantity)
}

export function assertQuantity(unit: Unit, quantity: Quantity): void {
  if (UNITS[unit].quantity !== quantity) throw new UnitMismatchError(unit, quantity)
}

export function convert(value: number, from: Unit, to: Unit): number {
  if (from === to) return value
  const quantity = UNITS[from].quantity
  assertQuantity(to, quantity)
  if (quantity === 'Text') return value
  return UNITS[to].fromCanonical(UNITS[from].toCanonical(value))
}
