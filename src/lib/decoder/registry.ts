import type { MeterDriver } from './types'
import type { DriverDefinition } from './schema'
import { builtinDrivers } from './builtins'
import { DriverDefinitionSchema, driverFromDefinition } from './schema'
import { DriverDefinitionError } from './errors'

function makeKey(manufacturer: string, version: number, type: number): string {
  return `${manufacturer.toUpperCase()}:${version}:${type}`
}

interface DriverTable {
  byName: Map<string, MeterDriver>
  byDetection: Map<string, MeterDriver>
}

function emptyTable(): DriverTable {
  return { byName: new Map(), byDetection: new Map() }
}

function addTo(table: DriverTable, driver: MeterDriver): void {
  table.byName.set(driver.name, driver)
  for (const d of driver.detections) {
    table.byDetection.set(makeKey(d.manufacturer, d.version, d.type), driver)
  }
}

/**
 * Drivers by name and by (manufacturer, version, type) detection. Built-ins
 * are registered when the registry is constructed; custom drivers loaded from
 * JSON definitions take precedence over them.
 */
export class DriverRegistry {
  private builtIn = emptyTable()
  private custom = emptyTable()
  private definitions: DriverDefinition[] = []

  constructor(drivers: readonly MeterDriver[] = builtinDrivers) {
    for (const driver of drivers) {
      this.register(driver)
    }
  }

  register(driver: MeterDriver): void {
    if (this.builtIn.byName.has(driver.name)) {
      throw new DriverDefinitionError(driver.name, 'already registered')
    }
    for (const d of driver.detections) {
      const owner = this.builtIn.byDetection.get(makeKey(d.manufacturer, d.version, d.type))
      if (owner) {
        throw new DriverDefinitionError(driver.name, `detection ${d.manufacturer} ${d.version}/${d.type} is taken by ${owner.name}`)
      }
    }
    addTo(this.builtIn, driver)
  }

  getDriver(name: string): MeterDriver | null {
    return this.custom.byName.get(name) ?? this.builtIn.byName.get(name) ?? null
  }

  lookup(manufacturer: string, version: number, type: number): MeterDriver | null {
    const key = makeKey(manufacturer, version, type)
    return this.custom.byDetection.get(key) ?? this.builtIn.byDetection.get(key) ?? null
  }

  list(): MeterDriver[] {
    const names = new Set([...this.builtIn.byName.keys(), ...this.custom.byName.keys()])
    return [...names].flatMap((n) => {
      const driver = this.getDriver(n)
      return driver ? [driver] : []
    })
  }

  getCustomDefinitions(): DriverDefinition[] {
    return [...this.definitions]
  }

  addCustomDriver(input: unknown): MeterDriver {
    const driver = driverFromDefinition(input)
    const definition = DriverDefinitionSchema.parse(input)
    this.definitions = this.definitions.filter((d) => d.name !== definition.name)
    this.definitions.push(definition)
    this.rebuildCustom()
    return driver
  }

  removeCustomDriver(name: string): void {
    this.definitions = this.definitions.filter((d) => d.name !== name)
    this.rebuildCustom()
  }

  removeAllCustomDrivers(): void {
    this.definitions = []
    this.custom = emptyTable()
  }

  exportAll(): string {
    return JSON.stringify(this.definitions, null, 2)
  }

  importAll(json: string): void {
    const parsed: unknown = JSON.parse(json)
    if (!Array.isArray(parsed)) throw new Error('Expected an array of driver definitions')
    // validate everything before touching the registry
    for (const d of parsed) {
      driverFromDefinition(d)
    }
    for (const d of parsed) {
      this.addCustomDriver(d)
    }
  }

  private rebuildCustom(): void {
    const table = emptyTable()
    for (const def of this.definitions) {
      addTo(table, driverFromDefinition(def))
    }
    this.custom = table
  }
}
