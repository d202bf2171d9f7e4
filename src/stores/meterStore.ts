import { createStore } from 'zustand/vanilla'
import type { MeterEnvelope } from '../lib/decoder/types'
import type { MeterConfig } from '../lib/decoder/config'
import { DriverRegistry } from '../lib/decoder/registry'
import { Meter } from '../lib/decoder/meter'
import { matchesId } from '../lib/decoder/config'

export interface MeterReading {
  id: string
  driver: string
  json: Record<string, string | number>
  fields: string
  timestamp: number
}

type Logger = Pick<Console, 'warn' | 'debug'>

interface MeterStore {
  configs: MeterConfig[]
  meters: Map<string, Meter>
  readings: Map<string, MeterReading>

  setConfigs: (configs: MeterConfig[]) => void
  handleTelegram: (envelope: MeterEnvelope, payload: Uint8Array, timestamp: Date) => MeterReading | null
  reset: () => void
}

interface MeterStoreOptions {
  registry?: DriverRegistry
  configs?: MeterConfig[]
  logger?: Logger
}

function hex2(n: number): string {
  return `0x${n.toString(16).padStart(2, '0')}`
}

/**
 * Latest reading per device. Telegrams are routed to the first config whose
 * id matches; its Meter is created on first use and kept, so fields missing
 * from later telegram variants keep their values.
 */
export function createMeterStore(options: MeterStoreOptions = {}) {
  const registry = options.registry ?? new DriverRegistry()
  const logger = options.logger ?? console

  return createStore<MeterStore>((set, get) => ({
    configs: options.configs ?? [],
    meters: new Map(),
    readings: new Map(),

    setConfigs: (configs) => set({ configs }),

    handleTelegram: (envelope, payload, timestamp) => {
      const config = get().configs.find((c) => matchesId(c, envelope.id))
      if (!config) {
        logger.debug(`Ignoring ${envelope.manufacturer} ${envelope.id}: no meter configured`)
        return null
      }

      let meter = get().meters.get(envelope.id)
      if (!meter) {
        const driver = config.driver === 'auto'
          ? registry.lookup(envelope.manufacturer, envelope.version, envelope.type)
          : registry.getDriver(config.driver)
        if (!driver) {
          logger.warn(`No driver for ${envelope.manufacturer} ${envelope.id} `
            + `(version ${hex2(envelope.version)} type ${hex2(envelope.type)}, driver=${config.driver})`)
          return null
        }
        meter = new Meter(driver, { name: config.name, id: envelope.id, conversions: config.conversions })
      }

      const { telegram } = meter.decode(payload, envelope)
      for (const issue of telegram.issues) {
        logger.warn(`${config.name} ${envelope.id}: ${issue.message}`)
      }

      const reading: MeterReading = {
        id: envelope.id,
        driver: meter.driver.name,
        json: meter.toJson(timestamp),
        fields: meter.toFields(timestamp),
        timestamp: timestamp.getTime(),
      }
      const meters = new Map(get().meters).set(envelope.id, meter)
      set((s) => ({ meters, readings: new Map(s.readings).set(envelope.id, reading) }))
      return reading
    },

    reset: () => set({ meters: new Map(), readings: new Map() }),
  }))
}

export type MeterStoreApi = ReturnType<typeof createMeterStore>
