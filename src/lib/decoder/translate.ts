export interface TranslationRule {
  value: number
  label: string
}

/**
 * Decomposes a packed decimal alarm code into labels. Vendors sum the codes of
 * simultaneous conditions, e.g. 1030 = BATTERY_EXPIRED (1000) + REVERSE_FLOW (30).
 */
export interface TranslationTable {
  name: string
  okValue: number
  okLabel: string
  /** Label for any remainder no rule covers, rendered as `${unknownLabel}(${remainder})`. */
  unknownLabel: string
  /** Render the remainder as zero padded lowercase hex of this many digits instead of decimal. */
  hexDigits?: number
  rules: readonly TranslationRule[]
}

export function sortRules(rules: readonly TranslationRule[]): TranslationRule[] {
  return [...rules].sort((a, b) => b.value - a.value)
}

export function translate(table: TranslationTable, code: number): string {
  if (code === table.okValue) return table.okLabel

  const labels: string[] = []
  let remaining = code
  for (const rule of sortRules(table.rules)) {
    if (rule.value <= 0 || rule.value > remaining) continue
    labels.push(rule.label)
    remaining -= rule.value
  }
  if (remaining !== 0) labels.push(`${table.unknownLabel}(${formatRemainder(table, remaining)})`)
  return labels.join(' ')
}

function formatRemainder(table: TranslationTable, remaining: number): string {
  if (table.hexDigits === undefined) return String(remaining)
  return remaining.toString(16).padStart(table.hexDigits, '0')
}

/**
 * Greedy decomposition is only unambiguous when no rule value can also be
 * written as a sum of smaller rules. Returns the labels of rules that can,
 * so a new table entry can be reviewed before it ships.
 */
export function findAmbiguousRules(table: TranslationTable): string[] {
  const ambiguous: string[] = []
  const sorted = sortRules(table.rules).filter((r) => r.value > 0)
  for (let i = 0; i < sorted.length; i++) {
    const target = sorted[i].value
    const smaller = sorted.slice(i + 1).map((r) => r.value)
    // subset sum over the smaller values
    const reachable = new Set<number>([0])
    for (const v of smaller) {
      for (const s of [...reachable]) {
        if (s + v <= target) reachable.add(s + v)
      }
    }
    if (reachable.has(target)) ambiguous.push(sorted[i].label)
  }
  return ambiguous
}
