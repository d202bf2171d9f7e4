import { describe, it, expect } from 'vitest'
import { assertQuantity, CANONICAL_UNITS, convert, QUANTITIES, quantityOf, unitLabel, unitsOf } from '../units'
import { UnitMismatchError } from '../errors'

describe('units', () => {
  it('converts energy, volume and flow', () => {
    expect(convert(26000, 'wh', 'kwh')).toBe(26)
    expect(convert(1, 'kwh', 'mj')).toBe(3.6)
    expect(convert(1, 'm3', 'l')).toBe(1000)
    expect(convert(2.5, 'mwh', 'kwh')).toBe(2500)
    expect(convert(0.01, 'm3min', 'm3h')).toBeCloseTo(0.6)
  })

  it('converts temperatures with an offset', () => {
    expect(convert(0, 'c', 'k')).toBe(273.15)
    expect(convert(100, 'c', 'f')).toBe(212)
    expect(convert(32, 'f', 'c')).toBe(0)
  })

  it('round trips every unit through its canonical unit', () => {
    for (const quantity of QUANTITIES) {
      const canonical = CANONICAL_UNITS[quantity]
      for (const unit of unitsOf(quantity)) {
        expect(convert(convert(42.5, canonical, unit), unit, canonical)).toBeCloseTo(42.5, 9)
      }
    }
  })

  it('rejects conversions across quantities', () => {
    expect(() => convert(1, 'kwh', 'm3')).toThrow(UnitMismatchError)
    expect(() => assertQuantity('c', 'Energy')).toThrow('Unit c is not a Energy unit')
  })

  it('labels and classifies units', () => {
    expect(quantityOf('lh')).toBe('Flow')
    expect(unitLabel('kwh')).toBe('kWh')
    expect(unitLabel('c')).toBe('°C')
    expect(unitsOf('Power')).toEqual(['kw', 'w'])
  })
})
