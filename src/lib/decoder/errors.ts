export type StructuralIssue = 'dif-chain' | 'vif-chain' | 'unknown-vif' | 'reserved-lvar' | 'truncated'

/** Malformed DIF/VIF record. Collected on the telegram, never thrown past the index. */
export class StructuralDecodeError extends Error {
  readonly kind: StructuralIssue
  readonly offset: number

  constructor(kind: StructuralIssue, offset: number, message: string) {
    super(`${message} at offset ${offset}`)
    this.name = 'StructuralDecodeError'
    this.kind = kind
    this.offset = offset
  }
}

export class UnitMismatchError extends Error {
  constructor(unit: string, quantity: string) {
    super(`Unit ${unit} is not a ${quantity} unit`)
    this.name = 'UnitMismatchError'
  }
}

export class DriverDefinitionError extends Error {
  constructor(driver: string, message: string) {
    super(`Driver ${driver}: ${message}`)
    this.name = 'DriverDefinitionError'
  }
}
