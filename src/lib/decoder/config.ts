import { z } from 'zod'
import type { Unit } from './units'
import { isUnit } from './units'

const unitList = z.string().transform((text, ctx) => {
  const units: Unit[] = []
  for (const part of text.split(',').map((s) => s.trim()).filter(Boolean)) {
    if (!isUnit(part)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown unit ${part}` })
      return z.NEVER
    }
    units.push(part)
  }
  return units
})

export const MeterConfigSchema = z.object({
  name: z.string().min(1),
  // eight digits, or a prefix ending in * (a lone * matches every id)
  id: z.string().regex(/^(\d{8}|\d{0,7}\*)$/, 'meter id'),
  driver: z.string().min(1).default('auto'),
  key: z.string().regex(/^([0-9A-Fa-f]{32}|NOKEY)$/, 'AES key').optional(),
  conversions: unitList.default(''),
})

export type MeterConfig = z.infer<typeof MeterConfigSchema>

/**
 * Parses a `key=value` meter file. Blank lines and lines starting with `#`
 * are ignored; the first `=` splits key from value. `key` is validated but not
 * used here: payloads arrive already decrypted, and the value is only carried
 * so a parsed file keeps every setting it was written with.
 */
export function parseMeterConfig(text: string): MeterConfig {
  const raw: Record<string, string> = {}
  text.split(/\r?\n/).forEach((line, i) => {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) return
    const eq = trimmed.indexOf('=')
    if (eq <= 0) throw new Error(`Line ${i + 1}: expected key=value, got "${trimmed}"`)
    raw[trimmed.slice(0, eq).trim()] = trimmed.slice(eq + 1).trim()
  })
  return MeterConfigSchema.parse(raw)
}

export function matchesId(config: MeterConfig, id: string): boolean {
  if (config.id.endsWith('*')) return id.startsWith(config.id.slice(0, -1))
  return config.id === id
}
